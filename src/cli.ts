#!/usr/bin/env node
import { parseArgs } from "util";
import { BookIndexer } from "./BookIndexer";
import { parseConfig } from "./config/IndexerConfig";
import { IndexRunError, isIndexerError } from "./errors/IndexerErrors";
import { IndexerLogger } from "./IndexTypes";
import { formatFailures, serializeIndex, writeIndex } from "./serializer/IndexSerializer";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

const USAGE = "usage: book-concordance <dictionary> <chapters-dir> [--out FILE] [--ignore-case] [--strip-punctuation] [--header-lines N] [--collapse-same-line] [--strategy merge|shared] [--concurrency N] [--fail-fast] [--verbose]";

function parseCliArgs(argv: string[])
{
    return parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            "out": { type: "string", short: "o" },
            "ignore-case": { type: "boolean", short: "i" },
            "strip-punctuation": { type: "boolean" },
            "header-lines": { type: "string" },
            "collapse-same-line": { type: "boolean" },
            "strategy": { type: "string" },
            "concurrency": { type: "string" },
            "fail-fast": { type: "boolean" },
            "verbose": { type: "boolean", short: "v" },
        },
    });
}

type ParsedCliArgs = ReturnType<typeof parseCliArgs>;

export interface CliOutput {
    write(text: string): void;
}

/**
 * Runs one indexing batch and returns the process exit code.
 * The listing goes to --out when given, otherwise to `stdout`; failures always go to the logger.
 */
export async function main(argv: string[], stdout: CliOutput = process.stdout, logger: IndexerLogger = console): Promise<number>
{
    let parsed: ParsedCliArgs;
    try {
        parsed = parseCliArgs(argv);
    } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        logger.error(USAGE);
        return EXIT_FATAL;
    }

    const { values, positionals } = parsed;
    if (positionals.length !== 2) {
        logger.error(USAGE);
        return EXIT_FATAL;
    }
    const [dictionaryPath, chaptersPath] = positionals;

    //numeric and enum flags are checked by the config schema
    const flags: Record<string, unknown> = {
        caseSensitive: !values["ignore-case"],
        stripPunctuation: values["strip-punctuation"] ?? false,
        collapseSameLine: values["collapse-same-line"] ?? false,
        failFast: values["fail-fast"] ?? false,
        verbose: values["verbose"] ?? false,
    };
    if (values["header-lines"] !== undefined) flags.headerLines = Number(values["header-lines"]);
    if (values["concurrency"] !== undefined) flags.maxConcurrency = Number(values["concurrency"]);
    if (values["strategy"] !== undefined) flags.strategy = values["strategy"];

    try {
        const config = parseConfig(flags);
        const indexer = await BookIndexer.fromFiles(dictionaryPath, chaptersPath, config, logger);
        const report = await indexer.run();

        if (values["out"] !== undefined) await writeIndex(report.result, values["out"]);
        else stdout.write(serializeIndex(report.result));

        if (report.failures.length === 0) return EXIT_OK;
        logger.error(`${report.failures.length} chapter(s) could not be indexed:`);
        for (const line of formatFailures(report.failures)) logger.error(line);
        return EXIT_PARTIAL;
    } catch (error) {
        if (error instanceof IndexRunError) {
            logger.error(error.message);
            for (const line of formatFailures(error.failures)) logger.error(line);
            return EXIT_FATAL;
        }
        if (isIndexerError(error)) {
            logger.error(error.message);
            return EXIT_FATAL;
        }
        throw error;
    }
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then(code => { process.exitCode = code; })
        .catch(error => {
            console.error(error);
            process.exitCode = EXIT_FATAL;
        });
}
