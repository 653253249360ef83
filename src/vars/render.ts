import { ContainerDocument, Failure, MetadataNode, Snapshot, SNAPSHOT_BRANCHES } from "../types/metadataNode";

export function renderError(error: unknown): { error: string } {
  return { error: error instanceof Error ? error.message : String(error) };
}

export function renderNode(node: MetadataNode | ContainerDocument | Failure): unknown {
  switch (node.kind) {
    case "key-value":
      return { ...node.values };
    case "task-listing":
      return node.listing;
    case "opaque":
      return node.text;
    case "directory":
      return Object.fromEntries(
        Object.entries(node.children).map(([name, child]) => [name, renderNode(child)])
      );
    case "failure":
      return renderError(node.error);
    case "document":
      return node.value;
  }
}

/** Plain JSON view of a snapshot, branches in their canonical order. */
export function renderSnapshot(snapshot: Snapshot): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const name of SNAPSHOT_BRANCHES) {
    const branch = snapshot[name];
    if (branch !== undefined) {
      out[name] = renderNode(branch);
    }
  }
  return out;
}
