import { HttpClient } from "./http";

export interface Logger {
  warn(message: string, ...meta: unknown[]): void;
}

/** Everything one crawl needs; built fresh per snapshot. */
export interface CrawlContext {
  client: HttpClient;
  timeoutMs: number;
  maxDepth: number;
  logger?: Logger;
}
