import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createStubHttp, testCredentials } from "../../../test/fakes";
import { fetchAccessToken, loadCredentials } from "../credentials";
import { CredentialsError } from "../errors";

describe("loadCredentials", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "credentials-test-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads a complete credentials file", () => {
    const file = path.join(dir, "secrets.json");
    fs.writeFileSync(file, JSON.stringify(testCredentials));

    expect(loadCredentials(file)).toEqual(testCredentials);
  });

  it("names the missing fields", () => {
    const file = path.join(dir, "secrets.json");
    fs.writeFileSync(file, JSON.stringify({ client_id: "test-client-id", client_secret: "" }));

    expect(() => loadCredentials(file)).toThrow(
      `API credentials file ${file} is missing or has empty fields: client_secret, client_key`,
    );
  });

  it("fails on a missing file", () => {
    expect(() => loadCredentials(path.join(dir, "absent.json"))).toThrow(CredentialsError);
  });
});

describe("fetchAccessToken", () => {
  it("posts the client credentials as a form", async () => {
    const { http, tokenRequests } = createStubHttp(() => new Error("unexpected"));

    await expect(fetchAccessToken(http, testCredentials)).resolves.toBe("test-token-1");
    expect(tokenRequests[0]?.body).toBe(
      "client_key=test-client-key&client_secret=test-secret&grant_type=client_credentials",
    );
  });
});
