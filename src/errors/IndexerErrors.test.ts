import { ChapterListError, ChapterReadError, IndexerError, IndexerErrorCode, IndexRunError, VocabularyLoadError, describeCause, toIndexerError } from "./IndexerErrors";

describe('IndexerErrors', () => {
    test('ChapterReadError', () => {
        const cause = new Error("EACCES: permission denied");
        const error = new ChapterReadError(4, "chapter4.txt", cause);

        expect(error).toBeInstanceOf(IndexerError);
        expect(error.name).toBe("ChapterReadError");
        expect(error.message).toBe("Could not read chapter 4 (chapter4.txt): EACCES: permission denied");
        expect(error.cause).toBe(cause);
        expect(error.toJSON()).toEqual({
            name: "ChapterReadError",
            code: IndexerErrorCode.CHAPTER_READ_FAILED,
            message: "Could not read chapter 4 (chapter4.txt): EACCES: permission denied",
            context: { chapter: 4, name: "chapter4.txt" },
            cause: "EACCES: permission denied",
        });
    });

    test('VocabularyLoadError', () => {
        const error = new VocabularyLoadError("/words.txt", "gone");

        expect(error.message).toBe("Could not load vocabulary from /words.txt: gone");
        expect(error.toJSON().cause).toBeUndefined();
    });

    test('IndexRunError', () => {
        const error = new IndexRunError([
            { chapter: 2, name: "b", code: IndexerErrorCode.CHAPTER_READ_FAILED, message: "x" },
            { chapter: 5, name: "e", code: IndexerErrorCode.CHAPTER_READ_FAILED, message: "y" },
        ]);

        expect(error.message).toBe("Indexing failed for 2 chapter(s): 2, 5");
        expect(error.code).toBe(IndexerErrorCode.RUN_FAILED);
    });

    test('ChapterListError', () => {
        const cause = new Error("ENOENT");
        const error = new ChapterListError("Could not list chapters in /book: ENOENT", { path: "/book" }, cause);

        expect(error.code).toBe(IndexerErrorCode.CHAPTER_LIST_INVALID);
        expect(error.context).toEqual({ path: "/book" });
        expect(error.cause).toBe(cause);
    });

    test('toIndexerError', () => {
        const known = new VocabularyLoadError("/words.txt", "gone");
        expect(toIndexerError(known)).toBe(known);
        expect(toIndexerError(known, () => new IndexerError("never"))).toBe(known);

        const plain = toIndexerError(new Error("boom"), IndexerErrorCode.CHAPTER_READ_FAILED);
        expect(plain).toBeInstanceOf(IndexerError);
        expect(plain.message).toBe("boom");
        expect(plain.code).toBe(IndexerErrorCode.CHAPTER_READ_FAILED);

        expect(toIndexerError("odd").code).toBe(IndexerErrorCode.UNKNOWN);

        const wrapped = toIndexerError(new Error("EIO"), cause => new ChapterReadError(7, "seven.txt", cause));
        expect(wrapped).toBeInstanceOf(ChapterReadError);
        expect(wrapped.message).toBe("Could not read chapter 7 (seven.txt): EIO");
    });

    test('describeCause', () => {
        expect(describeCause(new Error("bad"))).toBe("bad");
        expect(describeCause(undefined)).toBe("unknown error");
        expect(describeCause(42)).toBe("42");
    });
});
