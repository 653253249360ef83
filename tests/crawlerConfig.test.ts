import { describe, expect, it } from "vitest";
import { loadCrawlerConfig } from "../src/config/crawlerConfig";

describe("loadCrawlerConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadCrawlerConfig({})).toEqual({ requestTimeoutMs: 200, maxDepth: 16 });
  });

  it("maps the metadata environment variables", () => {
    const config = loadCrawlerConfig({
      ECS_CONTAINER_METADATA_FILE: "/var/lib/ecs/data/metadata/task/web/ecs-container-metadata.json",
      AWS_CONTAINER_CREDENTIALS_RELATIVE_URI: "/v2/credentials/test-id",
      METADATA_REQUEST_TIMEOUT_MS: "500",
      METADATA_MAX_DEPTH: "4"
    });

    expect(config).toEqual({
      containerMetadataFile: "/var/lib/ecs/data/metadata/task/web/ecs-container-metadata.json",
      credentialsRelativeUri: "/v2/credentials/test-id",
      requestTimeoutMs: 500,
      maxDepth: 4
    });
  });

  it("treats empty values as unset", () => {
    const config = loadCrawlerConfig({ ECS_CONTAINER_METADATA_FILE: "", AWS_CONTAINER_CREDENTIALS_RELATIVE_URI: "" });

    expect(config.containerMetadataFile).toBeUndefined();
    expect(config.credentialsRelativeUri).toBeUndefined();
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadCrawlerConfig({ METADATA_REQUEST_TIMEOUT_MS: "soon" })).toThrow();
  });
});
