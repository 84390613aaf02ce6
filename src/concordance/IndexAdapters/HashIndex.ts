import BTree from "sorted-btree";
import { Occurrence, Word, compareWords } from "../../IndexTypes";
import { SharedIndex } from "../SharedIndex";

export class HashIndex extends SharedIndex
{
    //keyed by word in code unit order, each value is append-only
    index: BTree<Word, Occurrence[]> = new BTree<Word, Occurrence[]>(undefined, compareWords);

    static from(indexes: SharedIndex[]): HashIndex
    {
        const merged = new HashIndex();
        for (const index of indexes) merged.merge(index);
        return merged;
    }

    get wordCount(): number
    {
        return this.index.size;
    }

    protected append_internal(word: Word, occurrence: Occurrence): void
    {
        //if the word doesn't exist, create it
        const occurrences = this.index.get(word);
        if (occurrences) {
            occurrences.push(occurrence);
            return;
        }
        this.index.set(word, [occurrence]);
    }

    protected entries_internal(): Iterable<[Word, readonly Occurrence[]]>
    {
        return this.index.entries();
    }
}
