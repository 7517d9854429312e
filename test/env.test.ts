import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";

import { loadEnvFile, parseEnvLine } from "../src/env.js";

describe("parseEnvLine", () => {
  it("reads plain, exported and quoted entries", () => {
    expect(parseEnvLine("PRICE_CACHE_TTL_MS=30000")).toEqual({ key: "PRICE_CACHE_TTL_MS", value: "30000" });
    expect(parseEnvLine("export HTTP_API_TOKEN='test-secret'")).toEqual({ key: "HTTP_API_TOKEN", value: "test-secret" });
    expect(parseEnvLine('NOTE="a\\nb"')).toEqual({ key: "NOTE", value: "a\nb" });
  });

  it("skips comments, blanks and lines without a key", () => {
    expect(parseEnvLine("# comment")).toBeNull();
    expect(parseEnvLine("   ")).toBeNull();
    expect(parseEnvLine("=value")).toBeNull();
    expect(parseEnvLine("NO_EQUALS")).toBeNull();
  });
});

describe("loadEnvFile", () => {
  it("fills missing variables without overriding set ones", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "quotechain-env-"));
    const file = path.join(dir, ".env");
    fs.writeFileSync(file, "PRICE_REFRESH_WORKERS=8\n# skipped\nLOG_LEVEL=debug\n");
    const target: NodeJS.ProcessEnv = { LOG_LEVEL: "warn" };

    try {
      expect(loadEnvFile(file, target)).toBe(1);
      expect(target).toEqual({ LOG_LEVEL: "warn", PRICE_REFRESH_WORKERS: "8" });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("ignores a missing file", () => {
    expect(loadEnvFile(path.join(os.tmpdir(), "quotechain-missing", ".env"), {})).toBe(0);
  });
});
