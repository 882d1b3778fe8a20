// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync, unlinkSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createFileCredentialStore } from "./credentials.ts";

const getTempPath = () =>
  join(tmpdir(), `test-credentials-${Date.now()}-${Math.random().toString(36).slice(2)}.toml`);

describe("createFileCredentialStore", () => {
  let tempPath: string;

  beforeEach(() => {
    tempPath = getTempPath();
  });

  afterEach(() => {
    try {
      unlinkSync(tempPath);
    } catch {
      // file might not exist
    }
  });

  it("reads clientId and clientSecret from the file", async () => {
    writeFileSync(tempPath, `clientId = "test-client"\nclientSecret = "test-secret"\n`);

    const store = createFileCredentialStore(tempPath, {});

    expect(await store.load()).toEqual({ clientId: "test-client", clientSecret: "test-secret" });
  });

  it("prefers environment credentials when both are set", async () => {
    writeFileSync(tempPath, `clientId = "file-client"\nclientSecret = "file-secret"\n`);

    const store = createFileCredentialStore(tempPath, {
      REGISTRY_CLIENT_ID: "env-client",
      REGISTRY_CLIENT_SECRET: "env-secret",
    });

    expect(await store.load()).toEqual({ clientId: "env-client", clientSecret: "env-secret" });
  });

  it("ignores a lone environment variable", async () => {
    writeFileSync(tempPath, `clientId = "file-client"\nclientSecret = "file-secret"\n`);

    const store = createFileCredentialStore(tempPath, { REGISTRY_CLIENT_ID: "env-client" });

    expect(await store.load()).toEqual({ clientId: "file-client", clientSecret: "file-secret" });
  });

  it("fails with a config error when the file is missing", async () => {
    const store = createFileCredentialStore(tempPath, {});

    await expect(store.load()).rejects.toMatchObject({ code: "config" });
  });

  it("fails with a config error when a key is missing", async () => {
    writeFileSync(tempPath, `clientId = "test-client"\n`);

    const store = createFileCredentialStore(tempPath, {});

    await expect(store.load()).rejects.toMatchObject({ code: "config" });
  });

  it("fails with a config error when the file is not TOML", async () => {
    writeFileSync(tempPath, `clientId = = broken`);

    const store = createFileCredentialStore(tempPath, {});

    await expect(store.load()).rejects.toMatchObject({ code: "config" });
  });
});
