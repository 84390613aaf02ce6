export { BookIndexer } from "./BookIndexer";
export { IndexCoordinator } from "./coordinator/IndexCoordinator";
export { scanChapter } from "./worker/ChapterWorker";
export { SharedIndex } from "./concordance/SharedIndex";
export { HashIndex } from "./concordance/IndexAdapters/HashIndex";
export { Vocabulary } from "./vocabulary/Vocabulary";
export {
    ChapterSource,
    FileChapterSource,
    InMemoryChapterSource,
    chapterSourcesFromFiles,
    chapterSourcesFromLines,
    listChapterFiles,
} from "./chapters/ChapterSource";
export { DEFAULT_CONFIG, IndexerConfig, IndexerConfigInput, parseConfig, resolveConfig } from "./config/IndexerConfig";
export { normalizeLine, splitLines, tokenizeLine } from "./text/Tokenizer";
export { formatFailures, formatOccurrence, serializeIndex, serializeLines, writeIndex } from "./serializer/IndexSerializer";
export * from "./errors/IndexerErrors";
export * from "./IndexTypes";
