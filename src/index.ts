export * from "./types/metadataNode";
export * from "./metadata/errors";
export type { CrawlContext, Logger } from "./metadata/context";
export type { HttpClient, HttpResponse, ResponseBody } from "./metadata/http";
export { fetchHttpClient } from "./metadata/http";
export { classifyLeaf, parseCommandMenu, redactSecrets, REDACTED_VALUE } from "./metadata/shapes";
export { fetchLeaf } from "./metadata/leaf";
export { recurseDirectory } from "./metadata/directory";
export type { CrawlOptions } from "./metadata/snapshot";
export { crawlSnapshot, INVALID_TASK_ROLE, NO_TASK_ROLE_URI } from "./metadata/snapshot";
export type { CrawlerConfig } from "./config/crawlerConfig";
export { CrawlerConfigSchema, loadCrawlerConfig } from "./config/crawlerConfig";
export { renderNode, renderSnapshot } from "./vars/render";
export { metadataVar, VarRegistry, METADATA_VAR_NAME } from "./vars/registry";
export { createVarsHandler, startVarsServer, VARS_PATH } from "./server/varsHandler";
