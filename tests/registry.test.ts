import { describe, expect, it } from "vitest";
import { INSTANCE_IDENTITY_URL } from "../src/metadata/endpoints";
import { metadataVar, VarRegistry } from "../src/vars/registry";
import { FakeMetadataClient } from "./helpers/fakeMetadataClient";

describe("VarRegistry", () => {
  it("refuses to publish the same name twice", () => {
    const registry = new VarRegistry();
    registry.publish("aws", () => ({}));

    expect(() => registry.publish("aws", () => ({}))).toThrow("Reuse of published var name: aws");
  });

  it("renders variables sorted by name", async () => {
    const registry = new VarRegistry();
    registry.publish("uptime", () => 42);
    registry.publish("build", async () => ({ version: "0.1.0" }));

    const rendered = await registry.render();

    expect(Object.keys(rendered)).toEqual(["build", "uptime"]);
    expect(rendered).toEqual({ build: { version: "0.1.0" }, uptime: 42 });
  });

  it("renders a failing variable as an error value", async () => {
    const registry = new VarRegistry();
    registry.publish("broken", () => {
      throw new Error("boom");
    });
    registry.publish("ok", () => "fine");

    await expect(registry.render()).resolves.toEqual({ broken: { error: "boom" }, ok: "fine" });
  });

  it("crawls again on every read of the metadata variable", async () => {
    const client = new FakeMetadataClient({ [INSTANCE_IDENTITY_URL]: '{"region":"us-east-1"}' });
    const registry = new VarRegistry();
    registry.publish("aws", metadataVar({ client }));

    const first = await registry.render();
    const second = await registry.render();

    expect(first).toEqual({ aws: { "instance-identity": { region: "us-east-1" } } });
    expect(second).toEqual(first);
    expect(client.requested.filter((url) => url === INSTANCE_IDENTITY_URL)).toHaveLength(2);
  });
});
