import { IndexSealedError } from "../errors/IndexerErrors";
import { IndexedEntry, IndexedResult, Occurrence, OccurrenceSink, Word, compareOccurrences, compareWords } from "../IndexTypes";

/**
 * Word → occurrences accumulator written by every chapter worker of a run.
 *
 * The lifecycle has two phases split by {@link seal}: before it the index only accepts
 * appends, after it the index only answers {@link readAll}. The coordinator seals the index
 * once every worker has finished, so a read can never observe a half-built index.
 *
 * Adapters only provide storage. `append_internal` must complete synchronously: the event
 * loop then never interleaves two appends, which makes check-and-create plus append atomic
 * for every word without a lock.
 */
export abstract class SharedIndex implements OccurrenceSink
{
    private sealed = false;

    //Your adapter must implement these methods to interact with its storage
    protected abstract append_internal(word: Word, occurrence: Occurrence): void;
    //every stored word with its occurrences in insertion order, words in any order
    protected abstract entries_internal(): Iterable<[Word, readonly Occurrence[]]>;
    abstract get wordCount(): number;

    append(word: Word, occurrence: Occurrence): void
    {
        if (this.sealed) throw new IndexSealedError(`Cannot append "${word}": the index is sealed`);
        if (!isPositiveInteger(occurrence.chapter) || !isPositiveInteger(occurrence.line)) {
            throw new RangeError(`Invalid occurrence ${occurrence.chapter}.${occurrence.line} for "${word}"`);
        }
        //copy so callers cannot mutate what was recorded
        this.append_internal(word, { chapter: occurrence.chapter, line: occurrence.line });
    }

    //append every occurrence held by another index, the other index is left untouched
    merge(other: SharedIndex): void
    {
        for (const [word, occurrences] of other.entries_internal()) {
            for (const occurrence of occurrences) this.append(word, occurrence);
        }
    }

    seal(): void
    {
        this.sealed = true;
    }

    get isSealed(): boolean
    {
        return this.sealed;
    }

    //the ordering is applied here, not while appending, so it does not depend on worker timing
    readAll(): IndexedResult
    {
        if (!this.sealed) throw new IndexSealedError("Cannot read the index before every worker has finished");

        let occurrenceCount = 0;
        const entries: IndexedEntry[] = [];
        for (const [word, occurrences] of this.entries_internal()) {
            const sorted = [...occurrences].sort(compareOccurrences);
            occurrenceCount += sorted.length;
            entries.push({ word, occurrences: sorted });
        }
        entries.sort((a, b) => compareWords(a.word, b.word));

        return { entries, occurrenceCount };
    }
}

function isPositiveInteger(value: number): boolean
{
    return Number.isInteger(value) && value >= 1;
}
