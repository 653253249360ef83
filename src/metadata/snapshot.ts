import { CrawlerConfigInput, CrawlerConfigSchema } from "../config/crawlerConfig";
import { ContainerDocument, Directory, Failure, failure, Leaf, Snapshot } from "../types/metadataNode";
import { readText } from "../utils/fs";
import { CrawlContext, Logger } from "./context";
import { recurseDirectory } from "./directory";
import {
  ecsAgentUrl,
  INSTANCE_IDENTITY_URL,
  LOCAL_IPV4_URL,
  METADATA_URL,
  TASK_ROLE_BASE_URL,
  USER_DATA_URL
} from "./endpoints";
import { MetadataError, ParseError } from "./errors";
import { fetchHttpClient, HttpClient, readFoundBody, withResponse } from "./http";
import { fetchLeaf } from "./leaf";
import { ContainerDocumentSchema } from "./shapes";

export const NO_TASK_ROLE_URI = "(no-relative-url-for-task-information)";
export const INVALID_TASK_ROLE = "<invalid_single_value>";

export interface CrawlOptions {
  config?: CrawlerConfigInput;
  client?: HttpClient;
  logger?: Logger;
  readFile?: (filePath: string) => Promise<string>;
}

/** Metadata failures mean "not available here"; anything else is a bug and propagates. */
async function orAbsent<T>(task: Promise<T>): Promise<T | undefined> {
  try {
    return await task;
  } catch (error) {
    if (error instanceof MetadataError) return undefined;
    throw error;
  }
}

async function resolveLocalIp(ctx: CrawlContext): Promise<string | undefined> {
  const body = await orAbsent(withResponse(ctx, LOCAL_IPV4_URL, (res) => readFoundBody(LOCAL_IPV4_URL, res)));
  const ip = body?.trim();
  return ip ? ip : undefined;
}

async function resolveTaskRole(ctx: CrawlContext, relativeUri: string | undefined): Promise<string> {
  if (!relativeUri) return NO_TASK_ROLE_URI;
  let leaf: Leaf;
  try {
    leaf = await fetchLeaf(ctx, TASK_ROLE_BASE_URL + relativeUri);
  } catch (error) {
    if (error instanceof MetadataError) return error.message;
    throw error;
  }
  if (leaf.kind !== "key-value") return INVALID_TASK_ROLE;
  return leaf.values.RoleArn ?? "";
}

async function crawlEcs(ctx: CrawlContext, relativeUri: string | undefined): Promise<Directory | undefined> {
  const localIp = await resolveLocalIp(ctx);
  if (!localIp) return undefined;
  const ecs = await orAbsent(recurseDirectory(ctx, ecsAgentUrl(localIp)));
  if (!ecs) return undefined;
  ecs.children.RoleArn = { kind: "opaque", text: await resolveTaskRole(ctx, relativeUri) };
  return ecs;
}

async function readContainerMetadata(
  filePath: string | undefined,
  readFile: (filePath: string) => Promise<string>
): Promise<ContainerDocument | Failure | undefined> {
  if (!filePath) return undefined;
  try {
    const value = ContainerDocumentSchema.parse(JSON.parse(await readFile(filePath)));
    return { kind: "document", value };
  } catch (error) {
    return failure(new ParseError(filePath, error));
  }
}

/**
 * Crawl every metadata source into a fresh snapshot. Sources are crawled in
 * parallel; a source that is unreachable is left out rather than failing the
 * whole snapshot. Only the container metadata file reports its failure in place.
 * Rejects with a zod error when `options.config` is invalid; once the config is
 * accepted the crawl itself always resolves.
 */
export async function crawlSnapshot(options: CrawlOptions = {}): Promise<Snapshot> {
  const config = CrawlerConfigSchema.parse(options.config ?? {});
  const ctx: CrawlContext = {
    client: options.client ?? fetchHttpClient,
    timeoutMs: config.requestTimeoutMs,
    maxDepth: config.maxDepth,
    logger: options.logger
  };

  const [metaData, ecs, identity, userData, container] = await Promise.all([
    orAbsent(recurseDirectory(ctx, METADATA_URL)),
    crawlEcs(ctx, config.credentialsRelativeUri),
    orAbsent(fetchLeaf(ctx, INSTANCE_IDENTITY_URL)),
    orAbsent(fetchLeaf(ctx, USER_DATA_URL)),
    readContainerMetadata(config.containerMetadataFile, options.readFile ?? readText)
  ]);

  return {
    ...(metaData && { "meta-data": metaData }),
    ...(ecs && { "ecs-metadata": ecs }),
    ...(identity && { "instance-identity": identity }),
    ...(userData && { "user-data": userData }),
    ...(container && { "container-metadata": container })
  };
}
