import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ProbeCatalog, loadProbeCatalog } from "../src/catalog.js";
import {
  type ParsedProbeCatalog,
  parseProbeCatalog,
  probeChainNames,
  researchModeChainName,
  sourceTypeChainName
} from "../src/contracts.js";
import { ConfigError } from "../src/errors.js";
import { catalogPath, readCatalogJson } from "./helpers/fakePage.js";

function shippedCatalog(): ParsedProbeCatalog {
  return parseProbeCatalog(readCatalogJson());
}

describe("shipped probe catalog", () => {
  it("defines every chain the workflows use", async () => {
    const catalog = await loadProbeCatalog(catalogPath);

    for (const name of probeChainNames) {
      expect(catalog.chain(name).probes.length).toBeGreaterThan(0);
    }
    expect(catalog.chain(sourceTypeChainName("youtube")).name).toBe("sourceTypeOption:youtube");
    expect(catalog.chain(researchModeChainName("deep")).name).toBe("researchModeOption:deep");
    expect(catalog.noise.signInHosts).toEqual(["accounts.google.com"]);
  });

  it("binds notebook titles into the exact, prefix and link probes", async () => {
    const catalog = await loadProbeCatalog(catalogPath);

    const bound = catalog.bound("notebookByTitle", { title: 'Q3 "Plan"', short: "Q3" });

    expect(bound.probes.map((probe) => probe.selector)).toEqual([
      'text="Q3 \\"Plan\\""',
      "text=Q3",
      'a[href*="/notebook/"]'
    ]);
    expect(bound.probes[2]?.hasText).toBe("Q3");
  });

  it("labels unlabelled probes with their selector", () => {
    const catalog = ProbeCatalog.fromJson(readCatalogJson());
    const [probe] = catalog.chain("generationLoading").probes;

    expect(probe?.label).toBe(probe?.selector);
  });
});

describe("catalog validation", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "nbpilot-catalog-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("rejects a catalog missing a chain", () => {
    const { chatInput: _dropped, ...chains } = shippedCatalog().chains;

    expect(() => ProbeCatalog.fromJson({ ...shippedCatalog(), chains })).toThrow(
      "chains.chatInput: Missing probe chain 'chatInput'"
    );
  });

  it("rejects an empty chain and an unknown version", () => {
    const shipped = shippedCatalog();

    expect(() => ProbeCatalog.fromJson({ ...shipped, version: 2 })).toThrow(ConfigError);
    expect(() => ProbeCatalog.fromJson({ ...shipped, chains: { ...shipped.chains, chatInput: [] } })).toThrow(
      /chains\.chatInput/
    );
  });

  it("reports unreadable and malformed files as configuration errors", async () => {
    const broken = join(dir, "broken.json");
    await writeFile(broken, "{ not json", "utf8");

    await expect(loadProbeCatalog(broken)).rejects.toThrow(`Probe catalog ${broken} is not valid JSON`);
    await expect(loadProbeCatalog(join(dir, "missing.json"))).rejects.toBeInstanceOf(ConfigError);
  });
});
