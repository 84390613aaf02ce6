import { writeFile } from "fs/promises";
import { ChapterFailure, IndexedResult, Occurrence } from "../IndexTypes";

//chapter 3, line 12 → "3.12"
export function formatOccurrence(occurrence: Occurrence): string
{
    return `${occurrence.chapter}.${occurrence.line}`;
}

//one "<word> <c>.<l> <c>.<l> ..." line per word, in the result's order
export function serializeLines(result: IndexedResult): string[]
{
    return result.entries.map(entry => [entry.word, ...entry.occurrences.map(formatOccurrence)].join(" "));
}

export function serializeIndex(result: IndexedResult): string
{
    return serializeLines(result).map(line => `${line}\n`).join("");
}

export function formatFailures(failures: readonly ChapterFailure[]): string[]
{
    return failures.map(failure => `chapter ${failure.chapter} (${failure.name}): ${failure.message}`);
}

export async function writeIndex(result: IndexedResult, path: string): Promise<void>
{
    await writeFile(path, serializeIndex(result), "utf-8");
}
