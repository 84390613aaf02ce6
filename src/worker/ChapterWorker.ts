import { sha256 } from "js-sha256";
import { ChapterSource } from "../chapters/ChapterSource";
import { ScanOptions } from "../config/IndexerConfig";
import { EncodingError } from "../errors/IndexerErrors";
import { ChapterScanStats, LineIssue, OccurrenceSink } from "../IndexTypes";
import { tokenizeLine } from "../text/Tokenizer";
import { Vocabulary } from "../vocabulary/Vocabulary";

/**
 * Scans one chapter and appends an occurrence to `sink` for every token found in `vocabulary`.
 *
 * A chapter that cannot be read rejects with the source's ChapterReadError before anything is
 * appended. A line that cannot be tokenized is skipped and reported in `skippedLines`.
 */
export async function scanChapter(source: ChapterSource, vocabulary: Vocabulary, sink: OccurrenceSink, options: ScanOptions): Promise<ChapterScanStats>
{
    const lines = await source.readLines();
    const chapter = source.chapter;

    const skippedLines: LineIssue[] = [];
    let scannedLines = 0;
    let tokens = 0;
    let matches = 0;

    for (let i = options.headerLines; i < lines.length; i++) {
        const line = i + 1;

        let lineTokens: string[];
        try {
            lineTokens = tokenizeLine(lines[i], options, { chapter, line, name: source.name });
        } catch (error) {
            if (!(error instanceof EncodingError)) throw error;
            skippedLines.push(toLineIssue(error, chapter, line));
            continue;
        }

        scannedLines++;
        tokens += lineTokens.length;

        //with collapseSameLine a word is recorded at most once per line
        const seen = options.collapseSameLine ? new Set<string>() : undefined;
        for (const token of lineTokens) {
            if (!vocabulary.has(token)) continue;
            if (seen) {
                if (seen.has(token)) continue;
                seen.add(token);
            }
            sink.append(token, { chapter, line });
            matches++;
        }
    }

    return {
        chapter,
        name: source.name,
        sha256: sha256(lines.join("\n")),
        lines: lines.length,
        scannedLines,
        tokens,
        matches,
        skippedLines,
    };
}

function toLineIssue(error: EncodingError, chapter: number, line: number): LineIssue
{
    return {
        chapter: error.context.chapter ?? chapter,
        line: error.context.line ?? line,
        reason: error.message,
    };
}
