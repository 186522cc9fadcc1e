/**
 * Page capture engine
 *
 * Fetches a page through one of several engines, stores the stylesheets,
 * scripts, images and fonts it references next to it, and writes the result
 * as a self-contained snapshot directory.
 */

export { CaptureOrchestrator } from './orchestrator.js';
export type { BatchOptions, CaptureOrchestratorOptions } from './orchestrator.js';
export {
    BrowserSession,
    launchChromium,
    type BrowserLauncher,
    type BrowserOptions,
    type RenderBrowser,
    type RenderPage,
} from './browser.js';
export {
    BrowserBackend,
    createBackend,
    DirectBackend,
    type BackendFactoryOptions,
    type BrowserEngine,
    type FetchBackend,
    type RenderResult,
} from './backends/index.js';
export {
    agentToken,
    FetchPolicyCache,
    isPathAllowed,
    parseRobots,
    patternMatches,
    selectRules,
    type FetchPolicyOptions,
    type OriginPolicy,
    type RobotsGroup,
    type RobotsRule,
} from './fetch-policy.js';
export {
    classifyCssUrl,
    cssRelativePath,
    discoverCssResources,
    discoverResources,
    documentBaseUrl,
    FilenameRegistry,
    isLocalReference,
    reclassifyByContentType,
    resolveReference,
    synthesizeFilename,
    urlHash,
} from './resource-resolver.js';
export { rewriteCssReferences, rewriteHtmlReferences } from './url-rewriter.js';
export { extractTitle, sanitizeDocument } from './sanitize.js';
export {
    groupReferences,
    MAX_STYLESHEET_DEPTH,
    ResourceDownloader,
    type DownloadResult,
    type FetchAllOptions,
    type ResourceDownloaderOptions,
} from './resource-downloader.js';
export {
    captureEngineSchema,
    createUniqueDirectory,
    INDEX_FILE,
    METADATA_FILE,
    metadataRecordSchema,
    parseMetadata,
    readSnapshotMetadata,
    serializeMetadata,
    SnapshotMaterializer,
    THUMBNAIL_FILE,
    writeSnapshotMetadata,
    type MetadataRecord,
    type SnapshotHandle,
} from './snapshot.js';
export { forkSnapshot, type ForkOptions } from './versioning.js';
export {
    BackendError,
    MissingMetadataError,
    PolicyDeniedError,
    ResourceFetchError,
    WriteError,
} from './errors.js';
export * from './types.js';
