import { CrawlContext } from "./context";
import { describeError, MetadataError, NotFoundError, ParseError, TransportError } from "./errors";

export interface ResponseBody {
  text(): Promise<string>;
  close(): Promise<void>;
}

export interface HttpResponse {
  status: number;
  body: ResponseBody;
}

export interface HttpClient {
  get(url: string, timeoutMs: number): Promise<HttpResponse>;
}

export const HTTP_NOT_FOUND = 404;

export const fetchHttpClient: HttpClient = {
  async get(url: string, timeoutMs: number): Promise<HttpResponse> {
    let res: Response;
    try {
      res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      throw new TransportError(url, error);
    }
    return {
      status: res.status,
      body: {
        text: () => res.text(),
        close: async () => {
          if (!res.bodyUsed && res.body) {
            await res.body.cancel();
          }
        }
      }
    };
  }
};

/**
 * Issue one GET and hand the response to `handle`. The body is closed once
 * `handle` settles, whichever way it settles.
 */
export async function withResponse<T>(
  ctx: CrawlContext,
  url: string,
  handle: (res: HttpResponse) => Promise<T>
): Promise<T> {
  let res: HttpResponse;
  try {
    res = await ctx.client.get(url, ctx.timeoutMs);
  } catch (error) {
    throw error instanceof MetadataError ? error : new TransportError(url, error);
  }
  try {
    return await handle(res);
  } finally {
    await closeBody(ctx, url, res);
  }
}

async function closeBody(ctx: CrawlContext, url: string, res: HttpResponse): Promise<void> {
  try {
    await res.body.close();
  } catch (error) {
    ctx.logger?.warn("error ending body", { url, error: describeError(error) });
  }
}

/** Read the whole body of a response that must not be a 404. */
export async function readFoundBody(url: string, res: HttpResponse): Promise<string> {
  if (res.status === HTTP_NOT_FOUND) {
    throw new NotFoundError(url);
  }
  return readBody(url, res);
}

export async function readBody(url: string, res: HttpResponse): Promise<string> {
  try {
    return await res.body.text();
  } catch (error) {
    throw new ParseError(url, error);
  }
}
