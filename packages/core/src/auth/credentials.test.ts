import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  createCredentialProvider,
  createFileTokenStore,
  getCredentialsFile,
  isExpired,
} from "./credentials.js";
import { CredentialError } from "../sync/errors.js";

let configDir: string;
let credentialsFile: string;

beforeEach(() => {
  configDir = join(tmpdir(), `transcript-sync-cred-test-${Date.now()}-${Math.random().toString(16).slice(2)}`);
  mkdirSync(configDir, { recursive: true });
  credentialsFile = getCredentialsFile(configDir);
});

afterEach(() => {
  rmSync(configDir, { recursive: true, force: true });
});

describe("createFileTokenStore", () => {
  it("returns null when nothing is stored", async () => {
    expect(await createFileTokenStore(credentialsFile).load()).toBeNull();
  });

  it("saves owner-only and loads back", async () => {
    const store = createFileTokenStore(credentialsFile);
    await store.save({ accessToken: "test-token", updatedAt: "2024-01-01T00:00:00.000Z" });

    expect(statSync(credentialsFile).mode & 0o777).toBe(0o600);
    expect(await store.load()).toEqual({ accessToken: "test-token", updatedAt: "2024-01-01T00:00:00.000Z" });
  });

  it("clears the file", async () => {
    const store = createFileTokenStore(credentialsFile);
    await store.save({ accessToken: "test-token" });
    await store.clear();

    expect(existsSync(credentialsFile)).toBe(false);
    await store.clear();
  });

  it("fails with CredentialError on a corrupt file", async () => {
    writeFileSync(credentialsFile, "{{");

    await expect(createFileTokenStore(credentialsFile).load()).rejects.toBeInstanceOf(CredentialError);
  });

  it("fails with CredentialError when the token is missing", async () => {
    writeFileSync(credentialsFile, JSON.stringify({ expiresAt: "2030-01-01T00:00:00Z" }));

    await expect(createFileTokenStore(credentialsFile).load()).rejects.toMatchObject({
      code: "CREDENTIAL_UNAVAILABLE",
    });
  });
});

describe("isExpired", () => {
  const now = new Date("2024-06-01T12:00:00Z");

  it("never expires without expiresAt", () => {
    expect(isExpired({ accessToken: "t" }, now)).toBe(false);
  });

  it("treats the last minute before expiry as expired", () => {
    expect(isExpired({ accessToken: "t", expiresAt: "2024-06-01T12:00:59Z" }, now)).toBe(true);
    expect(isExpired({ accessToken: "t", expiresAt: "2024-06-01T12:01:01Z" }, now)).toBe(false);
  });
});

describe("createCredentialProvider", () => {
  const now = () => new Date("2024-06-01T12:00:00Z");

  it("prefers the environment token", async () => {
    const store = createFileTokenStore(credentialsFile);
    await store.save({ accessToken: "stored-token" });

    const getToken = createCredentialProvider({ store, env: { TRANSCRIPT_SYNC_TOKEN: "env-token" }, now });

    expect(await getToken()).toBe("env-token");
  });

  it("falls back to the stored token", async () => {
    const store = createFileTokenStore(credentialsFile);
    await store.save({ accessToken: "stored-token", expiresAt: "2024-06-02T00:00:00Z" });

    expect(await createCredentialProvider({ store, now })()).toBe("stored-token");
  });

  it("fails when not logged in", async () => {
    const getToken = createCredentialProvider({ store: createFileTokenStore(credentialsFile), now });

    await expect(getToken()).rejects.toThrow("not authenticated. Run: transcript-sync auth login");
  });

  it("fails when the stored token expired", async () => {
    const store = createFileTokenStore(credentialsFile);
    await store.save({ accessToken: "stored-token", expiresAt: "2024-06-01T11:00:00Z" });

    await expect(createCredentialProvider({ store, now })()).rejects.toBeInstanceOf(CredentialError);
  });

  it("writes the documented file shape", async () => {
    const store = createFileTokenStore(credentialsFile);
    await store.save({ accessToken: "stored-token", updatedAt: "2024-06-01T00:00:00.000Z" });

    expect(JSON.parse(readFileSync(credentialsFile, "utf-8"))).toEqual({
      accessToken: "stored-token",
      updatedAt: "2024-06-01T00:00:00.000Z",
    });
  });
});
