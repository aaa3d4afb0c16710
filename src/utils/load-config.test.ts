import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadConfig", () => {
  let dir: string;
  let missingUserConfig: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "config-"));
    missingUserConfig = join(dir, "no-such-user-config.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads the built-in defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.rateLimit).toEqual({ capacity: 3, refillPerSecond: 3 });
    expect(config.retry).toEqual({ maxAttempts: 5, baseDelay: 1000, maxDelay: 30000 });
    expect(config.export.concurrency).toBe(5);
    expect(config.export.timezone).toBe("America/New_York");
  });

  it("merges nested sections from user and custom files", async () => {
    const userPath = join(dir, "user.json");
    const customPath = join(dir, "custom.json");
    await writeFile(userPath, JSON.stringify({ export: { concurrency: 2 }, logging: { level: "debug" } }));
    await writeFile(customPath, JSON.stringify({ export: { directory: "/data/runs" }, discovery: { maxPages: 3 } }));

    const { config, errors } = await loadConfig(customPath, userPath);

    expect(errors).toEqual([]);
    expect(config.export).toMatchObject({ concurrency: 2, directory: "/data/runs", stateFile: "state.json" });
    expect(config.logging.level).toBe("debug");
    expect(config.discovery).toMatchObject({ maxPages: 3, concurrency: 5 });
    expect(config.discovery.rateLimit).toEqual({ capacity: 10, refillPerSecond: 10 });
  });

  it("reports an invalid custom file and keeps the defaults", async () => {
    const customPath = join(dir, "custom.json");
    await writeFile(customPath, JSON.stringify({ export: { concurrency: 0 } }));

    const { config, errors } = await loadConfig(customPath, missingUserConfig);

    expect(config.export.concurrency).toBe(5);
    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe(customPath);
  });

  it("reports unreadable JSON", async () => {
    const customPath = join(dir, "custom.json");
    await writeFile(customPath, "{ nope");

    const { errors } = await loadConfig(customPath, missingUserConfig);
    expect(errors[0].error).toBeInstanceOf(SyntaxError);
  });

  it("overrides a single discovery rate limit field", async () => {
    const customPath = join(dir, "custom.json");
    await writeFile(
      customPath,
      JSON.stringify({ discovery: { rateLimit: { capacity: 20 } }, export: { concurrency: 2 } }),
    );

    const { config, errors } = await loadConfig(customPath, missingUserConfig);

    expect(errors).toEqual([]);
    expect(config.discovery.rateLimit).toEqual({ capacity: 20, refillPerSecond: 10 });
    expect(config.discovery.concurrency).toBe(5);
    expect(config.export.concurrency).toBe(2);
  });

  it("keeps base values for sections the override leaves out", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, { retry: { maxAttempts: 2 } });

    expect(merged.retry).toEqual({ maxAttempts: 2, baseDelay: 1000, maxDelay: 30000 });
    expect(merged.source).toEqual(base.source);
  });
});
