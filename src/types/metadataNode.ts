import { MetadataError } from "../metadata/errors";

export interface TaskContainer {
  DockerId: string;
  DockerName: string;
  Name: string;
}

export interface Task {
  Arn: string;
  DesiredStatus: string;
  KnownStatus: string;
  Family: string;
  Version: string;
  Containers: TaskContainer[];
}

export interface TaskListing {
  Tasks: Task[];
}

export interface KeyValueLeaf {
  kind: "key-value";
  values: Record<string, string>;
}

export interface TaskListingLeaf {
  kind: "task-listing";
  listing: TaskListing;
}

export interface OpaqueLeaf {
  kind: "opaque";
  text: string;
}

export type Leaf = KeyValueLeaf | TaskListingLeaf | OpaqueLeaf;

export interface Directory {
  kind: "directory";
  children: Record<string, MetadataNode>;
}

export interface Failure {
  kind: "failure";
  error: MetadataError;
}

export type MetadataNode = Leaf | Directory | Failure;

/** Parsed contents of the ECS container metadata file. */
export interface ContainerDocument {
  kind: "document";
  value: Record<string, unknown>;
}

export const SNAPSHOT_BRANCHES = [
  "meta-data",
  "ecs-metadata",
  "instance-identity",
  "user-data",
  "container-metadata"
] as const;

export type SnapshotBranch = (typeof SNAPSHOT_BRANCHES)[number];

export interface Snapshot {
  "meta-data"?: MetadataNode;
  "ecs-metadata"?: MetadataNode;
  "instance-identity"?: MetadataNode;
  "user-data"?: MetadataNode;
  "container-metadata"?: ContainerDocument | Failure;
}

export function failure(error: MetadataError): Failure {
  return { kind: "failure", error };
}
