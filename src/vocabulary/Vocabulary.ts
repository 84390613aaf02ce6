import { readFile } from "fs/promises";
import { TokenizerOptions } from "../config/IndexerConfig";
import { VocabularyLoadError } from "../errors/IndexerErrors";
import { Word, compareWords } from "../IndexTypes";
import { findEncodingIssue, splitLines, tokenizeLine } from "../text/Tokenizer";

/**
 * The fixed set of words eligible to be indexed.
 *
 * Words pass through the same normalization as chapter tokens, so a vocabulary built with
 * `caseSensitive: false` only holds lower-case words and matches lower-cased chapter text.
 * Read-only once constructed; workers share a single instance without locking.
 */
export class Vocabulary
{
    private readonly entries: ReadonlySet<Word>;
    //1-based lines (or word positions, for fromWords) dropped because they could not be tokenized
    readonly rejectedLines: readonly number[];

    private constructor(entries: Set<Word>, rejectedLines: number[] = [])
    {
        this.entries = entries;
        this.rejectedLines = rejectedLines;
    }

    static fromWords(words: Iterable<string>, options: TokenizerOptions): Vocabulary
    {
        const entries = new Set<Word>();
        const rejected: number[] = [];

        let position = 0;
        for (const word of words) {
            position++;
            if (findEncodingIssue(word)) {
                rejected.push(position);
                continue;
            }
            for (const token of tokenizeLine(word, options)) entries.add(token);
        }

        return new Vocabulary(entries, rejected);
    }

    //every token on every line is a word, so both "one word per line" lists and free text work
    static fromText(text: string, options: TokenizerOptions): Vocabulary
    {
        const entries = new Set<Word>();
        const rejected: number[] = [];

        splitLines(text).forEach((line, i) => {
            if (findEncodingIssue(line)) {
                rejected.push(i + 1);
                return;
            }
            for (const token of tokenizeLine(line, options)) entries.add(token);
        });

        return new Vocabulary(entries, rejected);
    }

    static async fromFile(path: string, options: TokenizerOptions): Promise<Vocabulary>
    {
        let text: string;
        try {
            text = await readFile(path, "utf-8");
        } catch (error) {
            throw new VocabularyLoadError(path, error);
        }
        return Vocabulary.fromText(text, options);
    }

    has(token: string): boolean
    {
        return this.entries.has(token);
    }

    get size(): number
    {
        return this.entries.size;
    }

    words(): Word[]
    {
        return Array.from(this.entries).sort(compareWords);
    }
}
