import { Directory, failure, MetadataNode } from "../types/metadataNode";
import { CrawlContext } from "./context";
import { DepthLimitError, MetadataError, TransportError } from "./errors";
import { readFoundBody, withResponse } from "./http";
import { fetchLeaf } from "./leaf";
import { parseCommandMenu } from "./shapes";

const SKIPPED_COMMANDS = new Set(["/license"]);
const SKIPPED_SEGMENTS = new Set(["security-credentials/"]);

/** Turn a child crawl into a node; its failure stays local to that child. */
async function settle(task: () => Promise<MetadataNode>, url: string): Promise<MetadataNode> {
  try {
    return await task();
  } catch (error) {
    return failure(error instanceof MetadataError ? error : new TransportError(url, error));
  }
}

/**
 * Walk a metadata directory. The body is either a command menu
 * (`{"AvailableCommands": [...]}`) whose entries are leaves, or a newline
 * listing where a trailing "/" marks a nested directory.
 */
export async function recurseDirectory(
  ctx: CrawlContext,
  base: string,
  depth = 0
): Promise<Directory> {
  if (depth > ctx.maxDepth) {
    throw new DepthLimitError(base, ctx.maxDepth);
  }
  const body = await withResponse(ctx, base, (res) => readFoundBody(base, res));
  // Names come from the server and may include "__proto__".
  const children = new Map<string, MetadataNode>();

  const commands = parseCommandMenu(body);
  if (commands) {
    for (const command of commands) {
      if (SKIPPED_COMMANDS.has(command)) continue;
      const url = base + command;
      children.set(command, await settle(() => fetchLeaf(ctx, url), url));
    }
    return { kind: "directory", children: Object.fromEntries(children) };
  }

  for (const segment of body.split("\n")) {
    if (segment === "" || SKIPPED_SEGMENTS.has(segment)) continue;
    const url = `${base}/${segment}`;
    const child = segment.endsWith("/")
      ? await settle(() => recurseDirectory(ctx, url, depth + 1), url)
      : await settle(() => fetchLeaf(ctx, url), url);
    children.set(segment, child);
  }
  return { kind: "directory", children: Object.fromEntries(children) };
}
