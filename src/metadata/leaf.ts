import { Leaf } from "../types/metadataNode";
import { CrawlContext } from "./context";
import { readFoundBody, withResponse } from "./http";
import { classifyLeaf } from "./shapes";

/**
 * Fetch a single metadata value. Rejects with NotFoundError on 404,
 * TransportError when the request fails and ParseError when the body cannot be read.
 */
export async function fetchLeaf(ctx: CrawlContext, url: string): Promise<Leaf> {
  return withResponse(ctx, url, async (res) => classifyLeaf(await readFoundBody(url, res)));
}
