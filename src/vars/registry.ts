import { crawlSnapshot, CrawlOptions } from "../metadata/snapshot";
import { renderError, renderSnapshot } from "./render";

/** A variable is evaluated every time the registry is rendered. */
export type VarFunc = () => unknown | Promise<unknown>;

export const METADATA_VAR_NAME = "aws";

export class VarRegistry {
  private readonly vars = new Map<string, VarFunc>();

  publish(name: string, fn: VarFunc): void {
    if (this.vars.has(name)) {
      throw new Error(`Reuse of published var name: ${name}`);
    }
    this.vars.set(name, fn);
  }

  names(): string[] {
    return [...this.vars.keys()].sort();
  }

  async render(): Promise<Record<string, unknown>> {
    const names = this.names();
    const values = await Promise.all(
      names.map(async (name) => {
        const fn = this.vars.get(name);
        if (!fn) return undefined;
        try {
          return await fn();
        } catch (error) {
          return renderError(error);
        }
      })
    );
    const out: Record<string, unknown> = {};
    names.forEach((name, i) => {
      out[name] = values[i];
    });
    return out;
  }
}

/** Variable that crawls and renders a fresh metadata snapshot on every read. */
export function metadataVar(options: CrawlOptions = {}): VarFunc {
  return async () => renderSnapshot(await crawlSnapshot(options));
}
