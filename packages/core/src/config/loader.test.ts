import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, loadConfigIfExists } from "./loader.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "streamstat-config-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadConfigIfExists", () => {
  it("falls back to defaults when the file is missing", async () => {
    const config = await loadConfigIfExists(join(dir, "missing.yaml"));
    expect(config.report.format).toBe("table");
    expect(config.report.precision).toBe(6);
    expect(config.aggregation.shards).toBe(1);
  });

  it("reads the file when present", async () => {
    const path = join(dir, "streamstat.config.yaml");
    await writeFile(path, "report:\n  precision: 2\n");
    expect((await loadConfigIfExists(path)).report.precision).toBe(2);
  });

  it("rethrows validation errors", async () => {
    const path = join(dir, "bad.yaml");
    await writeFile(path, "aggregation:\n  shards: 0\n");
    await expect(loadConfigIfExists(path)).rejects.toThrow("aggregation.shards");
  });

  it("rethrows malformed YAML", async () => {
    const path = join(dir, "broken.yaml");
    await writeFile(path, "report: [unclosed\n");
    await expect(loadConfigIfExists(path)).rejects.toThrow();
  });
});

describe("loadConfig", () => {
  it("rejects a missing file", async () => {
    await expect(loadConfig(join(dir, "missing.yaml"))).rejects.toMatchObject({ code: "ENOENT" });
  });
});
