import { loadCrawlerConfig } from "../config/crawlerConfig";
import { startVarsServer, VARS_PATH } from "../server/varsHandler";
import { METADATA_VAR_NAME, metadataVar, VarRegistry } from "../vars/registry";

interface ServeCommandOptions {
  port: number;
}

export async function runServeCommand(options: ServeCommandOptions): Promise<void> {
  const config = loadCrawlerConfig();
  const registry = new VarRegistry();
  registry.publish(METADATA_VAR_NAME, metadataVar({ config, logger: console }));

  const server = startVarsServer(registry, options.port, () => {
    console.log(`Serving ${VARS_PATH} on http://localhost:${options.port}`);
  });
  await new Promise<void>((resolve, reject) => {
    server.on("close", resolve);
    server.on("error", reject);
  });
}
