import path from "path";
import { loadCrawlerConfig } from "../config/crawlerConfig";
import { crawlSnapshot } from "../metadata/snapshot";
import { writeJson } from "../utils/fs";
import { renderSnapshot } from "../vars/render";

interface SnapshotCommandOptions {
  outPath?: string;
}

export async function runSnapshotCommand(options: SnapshotCommandOptions): Promise<void> {
  const config = loadCrawlerConfig();
  const snapshot = await crawlSnapshot({ config, logger: console });
  const rendered = renderSnapshot(snapshot);

  if (options.outPath) {
    const outPath = path.resolve(options.outPath);
    await writeJson(outPath, rendered);
    console.log(`Wrote metadata snapshot to ${outPath}`);
  } else {
    console.log(JSON.stringify(rendered, null, 2));
  }
}
