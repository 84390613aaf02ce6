import { z } from "zod";
import { IndexerConfigError } from "../errors/IndexerErrors";

export const IndexerConfigSchema = z.object({
    caseSensitive: z.boolean().default(true),
    stripPunctuation: z.boolean().default(false),
    //leading lines of every chapter that are never scanned, their line numbers still count
    headerLines: z.number().int().min(0).default(0),
    collapseSameLine: z.boolean().default(false),
    strategy: z.enum(["merge", "shared"]).default("merge"),
    //defaults to one slot per chapter
    maxConcurrency: z.number().int().min(1).optional(),
    failFast: z.boolean().default(false),
    verbose: z.boolean().default(false),
}).strict();

export type IndexerConfig = z.infer<typeof IndexerConfigSchema>;
export type IndexerConfigInput = z.input<typeof IndexerConfigSchema>;

export type TokenizerOptions = Pick<IndexerConfig, "caseSensitive" | "stripPunctuation">;
export type ScanOptions = TokenizerOptions & Pick<IndexerConfig, "headerLines" | "collapseSameLine">;

export const DEFAULT_CONFIG: IndexerConfig = IndexerConfigSchema.parse({});

export function resolveConfig(input: IndexerConfigInput = {}): IndexerConfig
{
    return parseConfig(input);
}

//for settings that arrive untyped, such as command-line flags
export function parseConfig(input: unknown): IndexerConfig
{
    const parsed = IndexerConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => {
            const key = issue.path.length > 0 ? issue.path.join(".") : "config";
            return `${key}: ${issue.message}`;
        });
        throw new IndexerConfigError(issues);
    }
    return parsed.data;
}
