#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runSnapshotCommand } from "../commands/snapshot";
import { runServeCommand } from "../commands/serve";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.METADATA_VARS_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("metadata-vars")
  .description("Crawl EC2/ECS metadata services into a single JSON snapshot")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides METADATA_VARS_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("snapshot")
  .description("Crawl once and print the snapshot")
  .option("--out <path>", "Write the snapshot JSON to this file instead of stdout")
  .action(async (opts) => {
    await runSnapshotCommand({ outPath: opts.out });
  });

program
  .command("serve")
  .description("Serve the snapshot as an expvar-style variable on /debug/vars")
  .option("--port <n>", "Port to listen on", (v) => parseInt(v, 10), 8080)
  .action(async (opts) => {
    await runServeCommand({ port: opts.port });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
