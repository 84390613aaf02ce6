import { PromisePool } from "@supercharge/promise-pool";
import { DateTime } from "luxon";
import { uuidv7 } from "uuidv7";
import { ChapterSource } from "../chapters/ChapterSource";
import { HashIndex } from "../concordance/IndexAdapters/HashIndex";
import { SharedIndex } from "../concordance/SharedIndex";
import { IndexerConfig, IndexerConfigInput, resolveConfig } from "../config/IndexerConfig";
import { ChapterListError, ChapterReadError, IndexRunError, toIndexerError } from "../errors/IndexerErrors";
import { ChapterFailure, ChapterScanStats, IndexerLogger, IndexRunReport } from "../IndexTypes";
import { Vocabulary } from "../vocabulary/Vocabulary";
import { scanChapter } from "../worker/ChapterWorker";

type ChapterOutcome = {
    stats: ChapterScanStats,
    local?: SharedIndex, //the worker's private index under the "merge" strategy
}

export class IndexCoordinator
{
    readonly config: IndexerConfig;
    private readonly logger: IndexerLogger;
    //builds the index a run writes into, swap it to use another adapter
    private readonly createIndex: () => SharedIndex;

    constructor(config: IndexerConfigInput = {}, logger: IndexerLogger = console, createIndex: () => SharedIndex = () => new HashIndex())
    {
        this.config = resolveConfig(config);
        this.logger = logger;
        this.createIndex = createIndex;
    }

    /**
     * Scans every chapter concurrently and returns the finished index.
     *
     * Workers are never cancelled: a failing chapter is recorded and the others run to
     * completion. Nothing is read from the shared index until the pool has settled.
     *
     * @throws ChapterListError when two sources share a chapter index or an index is not a positive integer
     * @throws IndexRunError in fail-fast mode when at least one chapter failed
     */
    async run(vocabulary: Vocabulary, chapters: readonly ChapterSource[]): Promise<IndexRunReport>
    {
        validateChapterList(chapters);

        const runId = uuidv7();
        const startedAt = DateTime.now();
        const { strategy, verbose } = this.config;
        const shared = this.createIndex();
        const failures: ChapterFailure[] = [];

        if (verbose) this.logger.log(`[${runId}] Indexing ${chapters.length} chapter(s) against ${vocabulary.size} word(s) using the ${strategy} strategy`);

        const { results } = await PromisePool
        .withConcurrency(this.concurrencyFor(chapters.length))
        .for([...chapters])
        .handleError(async (error: unknown, source: ChapterSource) => {
            const failure = toChapterFailure(error, source);
            failures.push(failure);
            this.logger.warn(`Chapter ${failure.chapter} (${failure.name}) failed: ${failure.message}`);
        })
        .process(async (source): Promise<ChapterOutcome> => {
            const local = strategy === "merge" ? this.createIndex() : undefined;
            const stats = await scanChapter(source, vocabulary, local ?? shared, this.config);
            if (verbose) this.logger.log(`[${runId}] Chapter ${stats.chapter}: ${stats.matches} match(es) in ${stats.scannedLines} line(s)`);
            return { stats, local };
        });

        //every worker has settled past this point
        const outcomes = [...results].sort((a, b) => a.stats.chapter - b.stats.chapter);
        for (const outcome of outcomes) {
            if (outcome.local) shared.merge(outcome.local);
        }
        shared.seal();

        failures.sort((a, b) => a.chapter - b.chapter);
        const lineIssues = outcomes.flatMap(outcome => outcome.stats.skippedLines);
        for (const issue of lineIssues) {
            this.logger.warn(`Skipped chapter ${issue.chapter} line ${issue.line}: ${issue.reason}`);
        }

        if (this.config.failFast && failures.length > 0) throw new IndexRunError(failures);

        const result = shared.readAll();
        const finishedAt = DateTime.now();

        if (verbose) this.logger.log(`[${runId}] Indexed ${result.entries.length} word(s), ${result.occurrenceCount} occurrence(s), ${failures.length} failed chapter(s)`);

        return {
            runId,
            startedAt: startedAt.toISO() ?? "",
            finishedAt: finishedAt.toISO() ?? "",
            durationMs: finishedAt.diff(startedAt).toMillis(),
            strategy,
            result,
            failures,
            chapters: outcomes.map(outcome => outcome.stats),
            lineIssues,
        };
    }

    private concurrencyFor(chapterCount: number): number
    {
        const limit = this.config.maxConcurrency ?? chapterCount;
        return Math.max(1, Math.min(limit, chapterCount));
    }
}

function validateChapterList(chapters: readonly ChapterSource[]): void
{
    const seen = new Set<number>();
    for (const source of chapters) {
        if (!Number.isInteger(source.chapter) || source.chapter < 1) {
            throw new ChapterListError(`Chapter index must be a positive integer, got ${source.chapter}`, { chapter: source.chapter });
        }
        if (seen.has(source.chapter)) {
            throw new ChapterListError(`Chapter ${source.chapter} is listed more than once`, { chapter: source.chapter });
        }
        seen.add(source.chapter);
    }
}

function toChapterFailure(error: unknown, source: ChapterSource): ChapterFailure
{
    //anything a source throws on its own is still a failure to read that chapter
    const wrapped = toIndexerError(error, cause => new ChapterReadError(source.chapter, source.name, cause));
    return {
        chapter: source.chapter,
        name: source.name,
        code: wrapped.code,
        message: wrapped.message,
    };
}
