import fs from "fs";
import os from "os";
import path from "path";
import { EXIT_FATAL, EXIT_OK, EXIT_PARTIAL, main } from "./cli";

const test_data = path.join(__dirname, "test_data");
const dictionary = path.join(test_data, "dictionary.txt");
const book = path.join(test_data, "book");

function harness()
{
    const written: string[] = [];
    const stdout = { write: (text: string) => { written.push(text); } };
    const logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
    return { written, stdout, logger };
}

//chapter1.txt is readable, chapter2.txt is a link to a file that does not exist
function bookWithUnreadableChapter(dir: string): string
{
    const chapters = path.join(dir, "book");
    fs.mkdirSync(chapters);
    fs.writeFileSync(path.join(chapters, "chapter1.txt"), "storm at the harbor\n");
    fs.symlinkSync(path.join(dir, "gone.txt"), path.join(chapters, "chapter2.txt"));
    return chapters;
}

describe('cli', () => {
    test('prints_the_listing', async () => {
        const { written, stdout, logger } = harness();

        const code = await main([dictionary, book], stdout, logger);

        expect(code).toBe(EXIT_OK);
        expect(written.join("")).toBe("harbor 2.2\nkeeper 1.1 2.2\nlantern 1.1 1.3\nstorm 1.2 1.3 3.1\n");
        expect(logger.error).not.toHaveBeenCalled();
    });

    test('flags', async () => {
        const { written, stdout, logger } = harness();

        const code = await main([dictionary, book, "-i", "--strip-punctuation", "--header-lines", "1", "--strategy", "shared", "--concurrency", "2"], stdout, logger);

        expect(code).toBe(EXIT_OK);
        expect(written.join("")).toBe("harbor 1.2 2.2\nkeeper 2.2\nlantern 1.3\nstorm 1.2 1.3\n");
    });

    test('writes_to_out', async () => {
        const { written, stdout, logger } = harness();
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), "book-concordance-"));
        const output = path.join(dir, "index.txt");

        const code = await main([dictionary, book, "--out", output], stdout, logger);

        expect(code).toBe(EXIT_OK);
        expect(written).toEqual([]);
        expect(fs.readFileSync(output, "utf-8")).toBe("harbor 2.2\nkeeper 1.1 2.2\nlantern 1.1 1.3\nstorm 1.2 1.3 3.1\n");
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('usage', async () => {
        const { stdout, logger } = harness();

        expect(await main([dictionary], stdout, logger)).toBe(EXIT_FATAL);
        expect(await main([dictionary, book, "--bogus"], stdout, logger)).toBe(EXIT_FATAL);
        expect(logger.error).toHaveBeenLastCalledWith(expect.stringMatching(/^usage: book-concordance/));
    });

    test('invalid_flag_values', async () => {
        const { written, stdout, logger } = harness();

        const code = await main([dictionary, book, "--strategy", "parallel"], stdout, logger);

        expect(code).toBe(EXIT_FATAL);
        expect(written).toEqual([]);
        expect(logger.error).toHaveBeenCalledWith(expect.stringMatching(/^Invalid indexer configuration: strategy: /));
    });

    test('missing_dictionary', async () => {
        const { written, stdout, logger } = harness();
        const missing = path.join(test_data, "missing.txt");

        const code = await main([missing, book], stdout, logger);

        expect(code).toBe(EXIT_FATAL);
        expect(written).toEqual([]);
        expect(logger.error).toHaveBeenCalledWith(expect.stringMatching(/^Could not load vocabulary from /));
    });

    describe('unreadable_chapter', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), "book-concordance-"));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        test('partial_run', async () => {
            const { written, stdout, logger } = harness();

            const code = await main([dictionary, bookWithUnreadableChapter(dir)], stdout, logger);

            expect(code).toBe(EXIT_PARTIAL);
            expect(written.join("")).toBe("harbor 1.1\nstorm 1.1\n");
            expect(logger.error).toHaveBeenCalledTimes(2);
            expect(logger.error).toHaveBeenNthCalledWith(1, "1 chapter(s) could not be indexed:");
            expect(logger.error).toHaveBeenNthCalledWith(2, expect.stringMatching(/^chapter 2 \(chapter2\.txt\): Could not read chapter 2 \(chapter2\.txt\): ENOENT/));
        });

        test('fail_fast', async () => {
            const { written, stdout, logger } = harness();
            const output = path.join(dir, "index.txt");

            const code = await main([dictionary, bookWithUnreadableChapter(dir), "--fail-fast", "--out", output], stdout, logger);

            expect(code).toBe(EXIT_FATAL);
            expect(written).toEqual([]);
            expect(fs.existsSync(output)).toBe(false);
            expect(logger.error).toHaveBeenNthCalledWith(1, "Indexing failed for 1 chapter(s): 2");
            expect(logger.error).toHaveBeenNthCalledWith(2, expect.stringMatching(/^chapter 2 \(chapter2\.txt\): Could not read chapter 2 \(chapter2\.txt\): ENOENT/));
        });
    });
});
