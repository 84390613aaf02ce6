import { stat } from "fs/promises";
import { ChapterSource, chapterSourcesFromFiles, chapterSourcesFromLines, listChapterFiles } from "./chapters/ChapterSource";
import { IndexerConfigInput, resolveConfig } from "./config/IndexerConfig";
import { IndexCoordinator } from "./coordinator/IndexCoordinator";
import { ChapterListError, describeCause } from "./errors/IndexerErrors";
import { IndexerLogger, IndexRunReport } from "./IndexTypes";
import { serializeIndex, writeIndex } from "./serializer/IndexSerializer";
import { Vocabulary } from "./vocabulary/Vocabulary";

export class BookIndexer
{
    vocabulary: Vocabulary;
    chapters: ChapterSource[];
    coordinator: IndexCoordinator;

    constructor(vocabulary: Vocabulary, chapters: ChapterSource[], coordinator: IndexCoordinator)
    {
        this.vocabulary = vocabulary;
        this.chapters = chapters;
        this.coordinator = coordinator;
    }

    //chapters is either a directory of .txt files or the chapter files in reading order
    static async fromFiles(dictionaryPath: string, chapters: string | string[], config: IndexerConfigInput = {}, logger: IndexerLogger = console): Promise<BookIndexer>
    {
        const coordinator = new IndexCoordinator(config, logger);
        //a missing dictionary aborts here, before any chapter is touched
        const vocabulary = await Vocabulary.fromFile(dictionaryPath, coordinator.config);
        warnRejected(vocabulary, logger);

        const paths = Array.isArray(chapters) ? chapters : await listChapterFilesIn(chapters);
        return new BookIndexer(vocabulary, chapterSourcesFromFiles(paths), coordinator);
    }

    static fromMemory(words: string[], chapters: string[][], config: IndexerConfigInput = {}, logger: IndexerLogger = console): BookIndexer
    {
        const resolved = resolveConfig(config);
        const vocabulary = Vocabulary.fromWords(words, resolved);
        warnRejected(vocabulary, logger);
        return new BookIndexer(vocabulary, chapterSourcesFromLines(chapters), new IndexCoordinator(resolved, logger));
    }

    async run(): Promise<IndexRunReport>
    {
        return await this.coordinator.run(this.vocabulary, this.chapters);
    }

    async runToListing(): Promise<{ listing: string, report: IndexRunReport }>
    {
        const report = await this.run();
        return { listing: serializeIndex(report.result), report };
    }

    async runToFile(outputPath: string): Promise<IndexRunReport>
    {
        const report = await this.run();
        await writeIndex(report.result, outputPath);
        return report;
    }
}

async function listChapterFilesIn(dir: string): Promise<string[]>
{
    try {
        const info = await stat(dir);
        if (!info.isDirectory()) return [dir];
        return await listChapterFiles(dir);
    } catch (error) {
        throw new ChapterListError(`Could not list chapters in ${dir}: ${describeCause(error)}`, { path: dir }, error);
    }
}

function warnRejected(vocabulary: Vocabulary, logger: IndexerLogger): void
{
    if (vocabulary.rejectedLines.length === 0) return;
    logger.warn(`Skipped vocabulary line(s) ${vocabulary.rejectedLines.join(", ")}: could not be tokenized`);
}
