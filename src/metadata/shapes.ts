import { z } from "zod";
import { Leaf, TaskListing } from "../types/metadataNode";

export const REDACTED_VALUE = "(removed)";
export const SENSITIVE_KEYS = ["Token", "AccessKeyId", "SecretAccessKey"] as const;

export const KeyValueSchema = z.record(z.string());

const TaskContainerSchema = z.object({
  DockerId: z.string().default(""),
  DockerName: z.string().default(""),
  Name: z.string().default("")
});

const TaskSchema = z.object({
  Arn: z.string().default(""),
  DesiredStatus: z.string().default(""),
  KnownStatus: z.string().default(""),
  Family: z.string().default(""),
  Version: z.string().default(""),
  Containers: z.array(TaskContainerSchema).default([])
});

export const TaskListingSchema = z.object({
  Tasks: z.array(TaskSchema).min(1)
});

export const CommandMenuSchema = z.object({
  AvailableCommands: z.array(z.string()).min(1)
});

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

export function redactSecrets(values: Record<string, string>): Record<string, string> {
  const redacted = { ...values };
  for (const key of SENSITIVE_KEYS) {
    if (Object.prototype.hasOwnProperty.call(redacted, key)) {
      redacted[key] = REDACTED_VALUE;
    }
  }
  return redacted;
}

/**
 * The metadata service does not say what it returned, so the shape is sniffed:
 * a flat string map first, then a task listing, otherwise the raw text.
 */
export function classifyLeaf(body: string): Leaf {
  const json = parseJson(body);

  const keyValue = KeyValueSchema.safeParse(json);
  if (keyValue.success) {
    return { kind: "key-value", values: redactSecrets(keyValue.data) };
  }

  const tasks = TaskListingSchema.safeParse(json);
  if (tasks.success) {
    const listing: TaskListing = tasks.data;
    return { kind: "task-listing", listing };
  }

  return { kind: "opaque", text: body };
}

/** Sub-command paths of an "available commands" menu, or undefined for anything else. */
export function parseCommandMenu(body: string): string[] | undefined {
  const menu = CommandMenuSchema.safeParse(parseJson(body));
  return menu.success ? menu.data.AvailableCommands : undefined;
}

/** The container metadata file must hold a JSON object. */
export const ContainerDocumentSchema = z.record(z.unknown());
