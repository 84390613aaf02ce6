import { ChapterFailure } from "../IndexTypes";

export enum IndexerErrorCode {
    CONFIG_INVALID = "CONFIG_INVALID",
    VOCABULARY_LOAD_FAILED = "VOCABULARY_LOAD_FAILED",
    CHAPTER_READ_FAILED = "CHAPTER_READ_FAILED",
    CHAPTER_LIST_INVALID = "CHAPTER_LIST_INVALID",
    ENCODING_INVALID = "ENCODING_INVALID",
    INDEX_SEALED = "INDEX_SEALED",
    RUN_FAILED = "RUN_FAILED",
    UNKNOWN = "UNKNOWN",
}

export interface ErrorContext {
    chapter?: number;
    name?: string;
    line?: number;
    path?: string;
    [key: string]: unknown;
}

export interface SerializedIndexerError {
    name: string;
    code: IndexerErrorCode;
    message: string;
    context: ErrorContext;
    cause?: string;
}

/**
 * Base class for every error the indexer raises on purpose.
 * Anything else that escapes a chapter worker is recorded as a ChapterReadError.
 */
export class IndexerError extends Error
{
    public readonly code: IndexerErrorCode;
    public readonly context: ErrorContext;

    constructor(message: string, code: IndexerErrorCode = IndexerErrorCode.UNKNOWN, context: ErrorContext = {}, options?: { cause?: unknown })
    {
        super(message, { cause: options?.cause });
        this.name = "IndexerError";
        this.code = code;
        this.context = context;
        Error.captureStackTrace?.(this, this.constructor);
    }

    toJSON(): SerializedIndexerError
    {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            context: this.context,
            cause: this.cause instanceof Error ? this.cause.message : undefined,
        };
    }
}

export class IndexerConfigError extends IndexerError
{
    public readonly issues: string[];

    constructor(issues: string[])
    {
        super(`Invalid indexer configuration: ${issues.join("; ")}`, IndexerErrorCode.CONFIG_INVALID);
        this.name = "IndexerConfigError";
        this.issues = issues;
    }
}

//fatal: raised before any chapter work starts
export class VocabularyLoadError extends IndexerError
{
    constructor(path: string, cause?: unknown)
    {
        super(`Could not load vocabulary from ${path}: ${describeCause(cause)}`, IndexerErrorCode.VOCABULARY_LOAD_FAILED, { path }, { cause });
        this.name = "VocabularyLoadError";
    }
}

//isolated to one chapter worker
export class ChapterReadError extends IndexerError
{
    public readonly chapter: number;
    public readonly chapterName: string;

    constructor(chapter: number, chapterName: string, cause?: unknown)
    {
        super(`Could not read chapter ${chapter} (${chapterName}): ${describeCause(cause)}`, IndexerErrorCode.CHAPTER_READ_FAILED, { chapter, name: chapterName }, { cause });
        this.name = "ChapterReadError";
        this.chapter = chapter;
        this.chapterName = chapterName;
    }
}

//recoverable: the worker skips the line and carries on
export class EncodingError extends IndexerError
{
    constructor(reason: string, context: ErrorContext = {})
    {
        super(reason, IndexerErrorCode.ENCODING_INVALID, context);
        this.name = "EncodingError";
    }
}

//fatal: the set of chapters to index could not be established
export class ChapterListError extends IndexerError
{
    constructor(message: string, context: ErrorContext = {}, cause?: unknown)
    {
        super(message, IndexerErrorCode.CHAPTER_LIST_INVALID, context, { cause });
        this.name = "ChapterListError";
    }
}

export class IndexSealedError extends IndexerError
{
    constructor(message: string)
    {
        super(message, IndexerErrorCode.INDEX_SEALED);
        this.name = "IndexSealedError";
    }
}

//fail-fast mode: thrown after the barrier when at least one chapter failed
export class IndexRunError extends IndexerError
{
    public readonly failures: ChapterFailure[];

    constructor(failures: ChapterFailure[])
    {
        const chapters = failures.map(failure => failure.chapter).join(", ");
        super(`Indexing failed for ${failures.length} chapter(s): ${chapters}`, IndexerErrorCode.RUN_FAILED, { chapters });
        this.name = "IndexRunError";
        this.failures = failures;
    }
}

export function isIndexerError(error: unknown): error is IndexerError
{
    return error instanceof IndexerError;
}

/**
 * Passes IndexerErrors through unchanged and wraps anything else.
 * `fallback` is either the code for a plain IndexerError carrying the cause's message, or a
 * factory for a more specific error.
 */
export function toIndexerError(error: unknown, fallback: IndexerErrorCode | ((cause: unknown) => IndexerError) = IndexerErrorCode.UNKNOWN): IndexerError
{
    if (isIndexerError(error)) return error;
    if (typeof fallback === "function") return fallback(error);
    return new IndexerError(describeCause(error), fallback, {}, { cause: error });
}

export function describeCause(cause: unknown): string
{
    if (cause instanceof Error) return cause.message;
    if (cause === undefined) return "unknown error";
    return String(cause);
}
