import { Dirent } from "fs";
import { readdir, readFile, stat } from "fs/promises";
import { basename, extname, join } from "path";
import { ChapterReadError } from "../errors/IndexerErrors";
import { splitLines } from "../text/Tokenizer";

//one chapter of the book, bound to the worker that scans it
export interface ChapterSource {
    chapter: number, //1-based, unique within a run
    name: string,
    readLines(): Promise<string[]>,
}

export class InMemoryChapterSource implements ChapterSource
{
    readonly chapter: number;
    readonly name: string;
    private readonly lines: readonly string[];

    constructor(chapter: number, lines: readonly string[], name: string = `chapter ${chapter}`)
    {
        this.chapter = chapter;
        this.lines = lines;
        this.name = name;
    }

    readLines(): Promise<string[]>
    {
        return Promise.resolve([...this.lines]);
    }
}

export class FileChapterSource implements ChapterSource
{
    readonly chapter: number;
    readonly name: string;
    readonly path: string;

    constructor(chapter: number, path: string)
    {
        this.chapter = chapter;
        this.path = path;
        this.name = basename(path);
    }

    async readLines(): Promise<string[]>
    {
        let text: string;
        try {
            //undecodable bytes become U+FFFD and are rejected line by line by the tokenizer
            text = await readFile(this.path, "utf-8");
        } catch (error) {
            throw new ChapterReadError(this.chapter, this.name, error);
        }
        return splitLines(text);
    }
}

const naturalOrder = new Intl.Collator("en", { numeric: true, sensitivity: "variant" });

//compares filenames so that "chapter2" sorts before "chapter10"
export function compareChapterNames(a: string, b: string): number
{
    return naturalOrder.compare(a, b) || (a < b ? -1 : a > b ? 1 : 0);
}

/**
 * Files in dir ending in extension, in natural filename order.
 * Symbolic links to files are followed. A dangling link is kept so that reading it fails as a
 * ChapterReadError instead of the chapter vanishing from the book.
 */
export async function listChapterFiles(dir: string, extension: string = ".txt"): Promise<string[]>
{
    const entries = await readdir(dir, { withFileTypes: true });
    const names: string[] = [];
    for (const entry of entries) {
        if (extname(entry.name).toLowerCase() !== extension.toLowerCase()) continue;
        if (await isChapterFile(dir, entry)) names.push(entry.name);
    }
    return names
        .sort(compareChapterNames)
        .map(name => join(dir, name));
}

async function isChapterFile(dir: string, entry: Dirent): Promise<boolean>
{
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
        return (await stat(join(dir, entry.name))).isFile();
    } catch {
        //dangling
        return true;
    }
}

//numbers the files 1..N in the order given
export function chapterSourcesFromFiles(paths: string[]): FileChapterSource[]
{
    return paths.map((path, i) => new FileChapterSource(i + 1, path));
}

export function chapterSourcesFromLines(chapters: readonly (readonly string[])[]): InMemoryChapterSource[]
{
    return chapters.map((lines, i) => new InMemoryChapterSource(i + 1, lines));
}
