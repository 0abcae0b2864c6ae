import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  loadVersionCatalog,
  parseVersionCatalog,
  defaultStarterVersion,
} from "../src/version-catalog.js";
import { ConfigurationUnavailableError, type Warning } from "../src/types.js";

const CATALOG_JSON = JSON.stringify({
  starterVersions: [
    { starterVersion: "3.4.0", camundaVersion: "7.12.0", springBootVersion: "2.2.1.RELEASE" },
    { starterVersion: "3.3.7", camundaVersion: "7.11.0", springBootVersion: "2.1.11.RELEASE" },
  ],
});

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "starter-forge-catalog-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseVersionCatalog", () => {
  it("keeps declaration order and makes the first entry the default", () => {
    const catalog = parseVersionCatalog(CATALOG_JSON, "versions.json");
    expect([...catalog.keys()]).toEqual(["3.4.0", "3.3.7"]);
    expect(defaultStarterVersion(catalog)).toBe("3.4.0");
    expect(catalog.get("3.3.7")).toEqual({
      starterVersion: "3.3.7",
      camundaVersion: "7.11.0",
      springBootVersion: "2.1.11.RELEASE",
    });
  });

  it("lets a later duplicate win while keeping the first position", () => {
    const raw = JSON.stringify({
      starterVersions: [
        { starterVersion: "3.4.0", camundaVersion: "7.12.0", springBootVersion: "2.2.1.RELEASE" },
        { starterVersion: "3.3.7", camundaVersion: "7.11.0", springBootVersion: "2.1.11.RELEASE" },
        { starterVersion: "3.4.0", camundaVersion: "7.12.1", springBootVersion: "2.2.2.RELEASE" },
      ],
    });
    const warnings: Warning[] = [];
    const catalog = parseVersionCatalog(raw, "versions.json", warnings);

    expect(catalog.size).toBe(2);
    expect([...catalog.keys()]).toEqual(["3.4.0", "3.3.7"]);
    expect(catalog.get("3.4.0")?.camundaVersion).toBe("7.12.1");
    expect(catalog.get("3.4.0")?.springBootVersion).toBe("2.2.2.RELEASE");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].level).toBe("info");
  });

  it("freezes loaded records", () => {
    const catalog = parseVersionCatalog(CATALOG_JSON, "versions.json");
    expect(Object.isFrozen(catalog.get("3.4.0"))).toBe(true);
  });

  it("accepts an empty list", () => {
    const catalog = parseVersionCatalog('{"starterVersions": []}', "versions.json");
    expect(catalog.size).toBe(0);
    expect(defaultStarterVersion(catalog)).toBeUndefined();
  });

  it("rejects malformed JSON", () => {
    expect(() => parseVersionCatalog("{not json", "versions.json")).toThrow(
      ConfigurationUnavailableError,
    );
  });

  it("rejects a document without starterVersions", () => {
    expect(() => parseVersionCatalog('{"versions": []}', "versions.json")).toThrow(
      'Versions file versions.json has no "starterVersions" array',
    );
  });

  it("rejects entries missing a field", () => {
    const raw = JSON.stringify({ starterVersions: [{ starterVersion: "3.4.0", camundaVersion: "7.12.0" }] });
    expect(() => parseVersionCatalog(raw, "versions.json")).toThrow(
      "Invalid entry at starterVersions[0] in versions.json",
    );
  });
});

describe("loadVersionCatalog", () => {
  it("reads an existing file without refreshing", async () => {
    const file = join(dir, "versions.json");
    writeFileSync(file, CATALOG_JSON);
    const updateVersions = vi.fn(async () => {});

    const catalog = await loadVersionCatalog({ versionsFile: file, updater: { updateVersions } });

    expect(catalog.size).toBe(2);
    expect(updateVersions).not.toHaveBeenCalled();
  });

  it("refreshes once and retries when the file is missing", async () => {
    const file = join(dir, "versions.json");
    const updateVersions = vi.fn(async () => {
      writeFileSync(file, CATALOG_JSON);
    });
    const warnings: Warning[] = [];

    const catalog = await loadVersionCatalog({
      versionsFile: file,
      updater: { updateVersions },
      warnings,
    });

    expect(updateVersions).toHaveBeenCalledTimes(1);
    expect(defaultStarterVersion(catalog)).toBe("3.4.0");
    expect(warnings.map((w) => w.module)).toEqual(["version-catalog"]);
  });

  it("fails after a single refresh that does not produce the file", async () => {
    const file = join(dir, "versions.json");
    const updateVersions = vi.fn(async () => {});

    await expect(
      loadVersionCatalog({ versionsFile: file, updater: { updateVersions } }),
    ).rejects.toThrow(`Versions file still missing after refresh: ${file}`);
    expect(updateVersions).toHaveBeenCalledTimes(1);
  });

  it("does not refresh when the file exists but is malformed", async () => {
    const file = join(dir, "versions.json");
    writeFileSync(file, "[[[");
    const updateVersions = vi.fn(async () => {});

    await expect(
      loadVersionCatalog({ versionsFile: file, updater: { updateVersions } }),
    ).rejects.toBeInstanceOf(ConfigurationUnavailableError);
    expect(updateVersions).not.toHaveBeenCalled();
  });

  it("does not retry when the path cannot be read as a file", async () => {
    const updateVersions = vi.fn(async () => {});

    await expect(
      loadVersionCatalog({ versionsFile: dir, updater: { updateVersions } }),
    ).rejects.toBeInstanceOf(ConfigurationUnavailableError);
    expect(updateVersions).not.toHaveBeenCalled();
  });

  it("fails immediately without an updater", async () => {
    const file = join(dir, "missing.json");
    await expect(loadVersionCatalog({ versionsFile: file })).rejects.toThrow(
      `Versions file not found: ${file}`,
    );
  });

  it("propagates updater failures", async () => {
    const file = join(dir, "versions.json");
    const failure = new Error("registry offline");
    const updateVersions = vi.fn(async () => {
      throw failure;
    });

    await expect(
      loadVersionCatalog({ versionsFile: file, updater: { updateVersions } }),
    ).rejects.toBe(failure);
  });
});
