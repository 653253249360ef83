import { z } from "zod";

export const DEFAULT_REQUEST_TIMEOUT_MS = 200;
export const DEFAULT_MAX_DEPTH = 16;

export const CrawlerConfigSchema = z.object({
  containerMetadataFile: z.string().min(1).optional(),
  credentialsRelativeUri: z.string().min(1).optional(),
  requestTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  // Nested directory levels followed below a crawl root.
  maxDepth: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_DEPTH)
});

export type CrawlerConfig = z.infer<typeof CrawlerConfigSchema>;
export type CrawlerConfigInput = z.input<typeof CrawlerConfigSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

export function loadCrawlerConfig(env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  return CrawlerConfigSchema.parse({
    containerMetadataFile: nonEmpty(env.ECS_CONTAINER_METADATA_FILE),
    credentialsRelativeUri: nonEmpty(env.AWS_CONTAINER_CREDENTIALS_RELATIVE_URI),
    requestTimeoutMs: nonEmpty(env.METADATA_REQUEST_TIMEOUT_MS),
    maxDepth: nonEmpty(env.METADATA_MAX_DEPTH)
  });
}
