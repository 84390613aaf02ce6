//a single place a vocabulary word was seen
//both indices are 1-based: chapter 1 is the first chapter, line 1 the first line of that chapter
export type Occurrence = {
    chapter: number,
    line: number,
}

export type Word = string;

//anything a chapter worker can write occurrences into
//the shared index and the private per-chapter index of the merge strategy both implement this
export interface OccurrenceSink {
    append(word: Word, occurrence: Occurrence): void;
}

export type IndexedEntry = {
    word: Word,
    occurrences: readonly Occurrence[], //sorted by chapter, then line
}

//the finished, read-only view of the index handed to the serializer
export type IndexedResult = {
    entries: readonly IndexedEntry[], //sorted by word
    occurrenceCount: number,
}

//"merge": every worker fills its own index, the coordinator merges them after the barrier
//"shared": every worker appends straight into the one shared index
export type IndexStrategy = "merge" | "shared";

//a line that was skipped because it could not be tokenized
export type LineIssue = {
    chapter: number,
    line: number,
    reason: string,
}

export type ChapterFailure = {
    chapter: number,
    name: string,
    code: string,
    message: string,
}

export type ChapterScanStats = {
    chapter: number,
    name: string,
    sha256: string, //hex digest of the chapter text as read
    lines: number,
    scannedLines: number, //lines past the header that were tokenized
    tokens: number,
    matches: number,
    skippedLines: LineIssue[],
}

export interface IndexRunReport {
    runId: string, //uuidv7
    startedAt: string, //ISO 8601
    finishedAt: string,
    durationMs: number,
    strategy: IndexStrategy,
    result: IndexedResult,
    failures: ChapterFailure[],
    chapters: ChapterScanStats[],
    lineIssues: LineIssue[],
}

export function compareOccurrences(a: Occurrence, b: Occurrence): number
{
    return a.chapter - b.chapter || a.line - b.line;
}

//plain code unit order, independent of the host locale
export function compareWords(a: Word, b: Word): number
{
    return a < b ? -1 : a > b ? 1 : 0;
}

//progress goes to log, failures and skipped lines to warn; defaults to console
export type IndexerLogger = Pick<Console, "log" | "warn" | "error">;
