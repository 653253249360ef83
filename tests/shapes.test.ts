import { describe, expect, it } from "vitest";
import { classifyLeaf, parseCommandMenu, redactSecrets, REDACTED_VALUE } from "../src/metadata/shapes";

const TASKS_BODY = JSON.stringify({
  Cluster: "default",
  Tasks: [
    {
      Arn: "arn:aws:ecs:us-east-1:123456789012:task/1",
      DesiredStatus: "RUNNING",
      KnownStatus: "RUNNING",
      Family: "web",
      Version: "3",
      Containers: [{ DockerId: "abc123", DockerName: "ecs-web-3-web", Name: "web", Ports: [] }]
    }
  ]
});

describe("leaf classification", () => {
  it("redacts credentials in key-value bodies and keeps other fields", () => {
    const body = JSON.stringify({
      Code: "Success",
      RoleArn: "arn:aws:iam::123456789012:role/test",
      AccessKeyId: "test-key",
      SecretAccessKey: "test-secret",
      Token: "test-token"
    });

    expect(classifyLeaf(body)).toEqual({
      kind: "key-value",
      values: {
        Code: "Success",
        RoleArn: "arn:aws:iam::123456789012:role/test",
        AccessKeyId: REDACTED_VALUE,
        SecretAccessKey: REDACTED_VALUE,
        Token: REDACTED_VALUE
      }
    });
  });

  it("does not add redacted keys that were absent", () => {
    expect(redactSecrets({ region: "us-east-1" })).toEqual({ region: "us-east-1" });
  });

  it("recognizes task listings and drops unknown fields", () => {
    expect(classifyLeaf(TASKS_BODY)).toEqual({
      kind: "task-listing",
      listing: {
        Tasks: [
          {
            Arn: "arn:aws:ecs:us-east-1:123456789012:task/1",
            DesiredStatus: "RUNNING",
            KnownStatus: "RUNNING",
            Family: "web",
            Version: "3",
            Containers: [{ DockerId: "abc123", DockerName: "ecs-web-3-web", Name: "web" }]
          }
        ]
      }
    });
  });

  it("fills missing task fields with empty values", () => {
    const leaf = classifyLeaf(JSON.stringify({ Tasks: [{ Family: "batch" }] }));
    expect(leaf).toEqual({
      kind: "task-listing",
      listing: {
        Tasks: [{ Arn: "", DesiredStatus: "", KnownStatus: "", Family: "batch", Version: "", Containers: [] }]
      }
    });
  });

  it("treats an empty task list as opaque text", () => {
    const body = JSON.stringify({ Tasks: [] });
    expect(classifyLeaf(body)).toEqual({ kind: "opaque", text: body });
  });

  it("keeps JSON with non-string values as opaque text", () => {
    const body = '{"Cluster":"default","Version":1}';
    expect(classifyLeaf(body)).toEqual({ kind: "opaque", text: body });
  });

  it("keeps a JSON null body as opaque text", () => {
    expect(classifyLeaf("null")).toEqual({ kind: "opaque", text: "null" });
  });

  it("returns plain bodies unchanged", () => {
    expect(classifyLeaf("ami-123")).toEqual({ kind: "opaque", text: "ami-123" });
  });
});

describe("command menu detection", () => {
  it("returns listed sub-commands", () => {
    expect(parseCommandMenu('{"AvailableCommands":["/v1/metadata","/license"]}')).toEqual([
      "/v1/metadata",
      "/license"
    ]);
  });

  it("ignores an empty menu", () => {
    expect(parseCommandMenu('{"AvailableCommands":[]}')).toBeUndefined();
  });

  it("ignores newline listings", () => {
    expect(parseCommandMenu("ami-id\nnetwork/")).toBeUndefined();
  });
});
