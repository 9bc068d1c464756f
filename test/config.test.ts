import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, requireApiKey, RC_FILE } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "gemcommit-config-"));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it("falls back to defaults", async () => {
    const config = await loadConfig({}, { cwd, env: {} });
    expect(config).toEqual({ style: "conventional commit", commit: false, apiKey: undefined });
  });

  it("reads the rc file", async () => {
    writeFileSync(join(cwd, RC_FILE), JSON.stringify({ style: "gitmoji", commit: true }));

    const config = await loadConfig({}, { cwd, env: {} });

    expect(config.style).toBe("gitmoji");
    expect(config.commit).toBe(true);
  });

  it("lets package.json#gemcommit override the rc file", async () => {
    writeFileSync(join(cwd, RC_FILE), JSON.stringify({ style: "gitmoji" }));
    writeFileSync(
      join(cwd, "package.json"),
      JSON.stringify({ name: "demo", gemcommit: { style: "plain" } })
    );

    const config = await loadConfig({}, { cwd, env: {} });

    expect(config.style).toBe("plain");
  });

  it("prefers CLI options over file config", async () => {
    writeFileSync(join(cwd, RC_FILE), JSON.stringify({ style: "gitmoji", commit: true }));

    const config = await loadConfig({ style: "conv", commit: false }, { cwd, env: {} });

    expect(config.style).toBe("conv");
    expect(config.commit).toBe(false);
  });

  it("takes the key from GEMINI_API_KEY before GOOGLE_API_KEY and the rc file", async () => {
    writeFileSync(join(cwd, RC_FILE), JSON.stringify({ apiKey: "file-key" }));

    const both = await loadConfig({}, {
      cwd,
      env: { GEMINI_API_KEY: "gemini-key", GOOGLE_API_KEY: "google-key" },
    });
    const google = await loadConfig({}, { cwd, env: { GOOGLE_API_KEY: "google-key" } });
    const file = await loadConfig({}, { cwd, env: {} });

    expect(both.apiKey).toBe("gemini-key");
    expect(google.apiKey).toBe("google-key");
    expect(file.apiKey).toBe("file-key");
  });

  it("reads the key from a .env file in the working directory", async () => {
    writeFileSync(join(cwd, ".env"), "# local settings\nGEMINI_API_KEY=dotenv-key\n");

    const config = await loadConfig({}, { cwd, env: {} });

    expect(config.apiKey).toBe("dotenv-key");
  });

  it("prefers the process environment over .env", async () => {
    writeFileSync(join(cwd, ".env"), "GEMINI_API_KEY=dotenv-key\n");

    const config = await loadConfig({}, { cwd, env: { GEMINI_API_KEY: "shell-key" } });

    expect(config.apiKey).toBe("shell-key");
  });

  it("lets .env override the rc file key", async () => {
    writeFileSync(join(cwd, RC_FILE), JSON.stringify({ apiKey: "file-key" }));
    writeFileSync(join(cwd, ".env"), "GOOGLE_API_KEY=dotenv-key\n");

    const config = await loadConfig({}, { cwd, env: {} });

    expect(config.apiKey).toBe("dotenv-key");
  });

  it("rejects an rc file that is not JSON", async () => {
    writeFileSync(join(cwd, RC_FILE), "style = gitmoji");

    await expect(loadConfig({}, { cwd, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects a mistyped rc field", async () => {
    writeFileSync(join(cwd, RC_FILE), JSON.stringify({ commit: "yes" }));

    await expect(loadConfig({}, { cwd, env: {} })).rejects.toThrow(
      '.gemcommitrc: "commit" must be a boolean'
    );
  });
});

describe("requireApiKey", () => {
  it("returns the configured key", () => {
    expect(requireApiKey({ style: "plain", commit: false, apiKey: "test-secret" })).toBe(
      "test-secret"
    );
  });

  it("fails when no key is available", () => {
    expect(() => requireApiKey({ style: "plain", commit: false })).toThrow(ConfigError);
  });
});
