export type { HarvestJob, HarvestOptions, HarvestOutcome, HarvestSummary, ScanResult, ScanSummary, ViewportSize } from './models/harvest';
export * from './schemas';
export { getRuntimeConfig, reloadRuntimeConfig } from './config/runtimeConfig';
export * from './config/pipelineDefaults';
export { atomicWriteText, atomicWriteLines } from './services/atomicFs';
export type { BrowserDriver, BrowserLauncher, BrowserPage, LaunchOptions, NavigateOptions, PageElement } from './services/browserDriver';
export { createLimiter } from './services/concurrency';
export type { Limiter } from './services/concurrency';
export { describeError, fail, isPipelineFailure, UsageError } from './services/errors';
export type { PipelineFailureCode, PipelineFailureShape } from './services/errors';
export { sanitizeFilenameFromUrl } from './services/filenames';
export { launchPlaywright } from './services/playwrightDriver';
export { mitigationRule, techniqueRule, ruleFor, synthesizeMitigationUrl, isMitigationId, MITIGATION_ID_PREFIX, MITIGATION_PATH_FRAGMENT } from './services/referenceRules';
export type { ReferenceCategory, ReferenceRule } from './services/referenceRules';
export { collectFromObjects, listJsonFiles, runScanner, scanReferences } from './services/referenceScanner';
export type { ScannerOptions, ScannerRunResult, SkipReason } from './services/referenceScanner';
export { extractElementText, extractSelectorText, fetchAndSaveText, harvestUrls, planJobs, summarizeOutcomes } from './services/textHarvester';
export { compareUrls, formatUrlList, readUrlsFromFiles, resolveInputFiles, stripTrailingSlashes, urlSortKey, writeUrlList } from './services/urlList';
