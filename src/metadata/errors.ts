/** Base for every error the crawler attaches to a node. `target` is the URL or file path involved. */
export class MetadataError extends Error {
  readonly target: string;

  constructor(message: string, target: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.target = target;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The metadata service answered 404. */
export class NotFoundError extends MetadataError {
  constructor(url: string) {
    super("not found", url);
  }
}

/** The request could not be built or sent, or it timed out. */
export class TransportError extends MetadataError {
  constructor(url: string, cause: unknown) {
    super(`request to ${url} failed: ${describeError(cause)}`, url, { cause });
  }
}

/** A body or file could not be read or decoded. */
export class ParseError extends MetadataError {
  constructor(target: string, cause: unknown) {
    super(`cannot read ${target}: ${describeError(cause)}`, target, { cause });
  }
}

export class DepthLimitError extends MetadataError {
  constructor(url: string, maxDepth: number) {
    super(`directory nesting exceeds ${maxDepth} levels`, url);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
