import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadDotEnv, parseDotEnv } from "../src/lib/env";

let dir = "";

afterEach(() => {
  vi.unstubAllEnvs();
  if (dir) {
    rmSync(dir, { recursive: true, force: true });
    dir = "";
  }
});

describe("parseDotEnv", () => {
  it("reads key/value pairs and strips quotes", () => {
    const contents = ["# comment", "", "CONCALL_DRY_RUN=1", "GCAL_GUEST_EMAIL = 'ir@example.com'", "BROKEN LINE", 'CONCALL_TIMEZONE="UTC"'].join("\n");
    expect(parseDotEnv(contents)).toEqual({
      CONCALL_DRY_RUN: "1",
      GCAL_GUEST_EMAIL: "ir@example.com",
      CONCALL_TIMEZONE: "UTC",
    });
  });
});

describe("loadDotEnv", () => {
  it("finds the nearest .env above the start directory without overriding set values", () => {
    dir = mkdtempSync(join(tmpdir(), "env-"));
    const nested = join(dir, "a", "b");
    mkdirSync(nested, { recursive: true });
    writeFileSync(join(dir, ".env"), "CONCALL_TEST_FROM_FILE=file\nCONCALL_TEST_PRESET=file\n", "utf-8");
    vi.stubEnv("CONCALL_TEST_FROM_FILE", "");
    vi.stubEnv("CONCALL_TEST_PRESET", "shell");

    expect(loadDotEnv(nested)).toBe(join(dir, ".env"));
    expect(process.env.CONCALL_TEST_FROM_FILE).toBe("file");
    expect(process.env.CONCALL_TEST_PRESET).toBe("shell");
  });
});
