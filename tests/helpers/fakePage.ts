import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { ProbeCatalog } from "../../src/catalog.js";
import { type ConfigInput, resolveConfig } from "../../src/config.js";
import {
  type ParsedProbeCatalog,
  type ProbeChainName,
  parseProbeCatalog,
  probeChainNames
} from "../../src/contracts.js";
import { silentLogger } from "../../src/logger.js";
import { resolveProbeChain } from "../../src/probe.js";
import type { SessionContext } from "../../src/session.js";
import type { ClickOptions, PageDriver, ProbeChain, ProbeSpec } from "../../src/types.js";

export const catalogPath = fileURLToPath(new URL("../../probes/notebook-ui.json", import.meta.url));

export interface FakeElement {
  id: number;
  selector: string;
  text: string;
  visible: boolean;
  attributes: Record<string, string>;
  onClick?: (page: FakePage, options?: ClickOptions) => void;
}

export interface FakeElementInit {
  text?: string;
  visible?: boolean;
  attributes?: Record<string, string>;
  onClick?: (page: FakePage, options?: ClickOptions) => void;
}

/**
 * In-process page: elements are matched by exact selector (and `hasText` as a
 * substring), waits advance a virtual clock instantly, and every interaction
 * is recorded in `actions`.
 */
export class FakePage implements PageDriver<FakeElement> {
  url = "about:blank";
  bodyText = "";
  clockMs = 0;
  closed = false;
  failScreenshots = false;
  readonly actions: string[] = [];
  readonly waits: number[] = [];
  readonly screenshots: string[] = [];
  readonly queried: string[] = [];
  onWait?: (page: FakePage) => void;
  onNavigate?: (url: string, page: FakePage) => string | undefined;

  private elements: FakeElement[] = [];
  private nextId = 1;

  add(selector: string, init: FakeElementInit = {}): FakeElement {
    const element: FakeElement = {
      id: this.nextId++,
      selector,
      text: init.text ?? "",
      visible: init.visible ?? true,
      attributes: init.attributes ?? {},
      onClick: init.onClick
    };
    this.elements.push(element);
    return element;
  }

  removeAll(selector: string): void {
    this.elements = this.elements.filter((element) => element.selector !== selector);
  }

  async queryAll(probe: ProbeSpec): Promise<FakeElement[]> {
    this.queried.push(probe.selector);
    return this.elements.filter(
      (element) =>
        element.selector === probe.selector && (probe.hasText === undefined || element.text.includes(probe.hasText))
    );
  }

  async isVisible(element: FakeElement): Promise<boolean> {
    return element.visible && this.elements.includes(element);
  }

  async navigate(url: string): Promise<void> {
    this.actions.push(`navigate ${url}`);
    this.url = this.onNavigate?.(url, this) ?? url;
  }

  probe(chain: ProbeChain): Promise<FakeElement | undefined> {
    return resolveProbeChain(chain, this);
  }

  async click(element: FakeElement, options?: ClickOptions): Promise<void> {
    this.actions.push(options?.button === "right" ? `right-click ${element.selector}` : `click ${element.selector}`);
    element.onClick?.(this, options);
  }

  async fill(element: FakeElement, text: string): Promise<void> {
    this.actions.push(`fill ${element.selector} ${text}`);
    element.attributes.value = text;
  }

  async pressKey(target: FakeElement | null, key: string): Promise<void> {
    this.actions.push(`press ${target?.selector ?? "page"} ${key}`);
  }

  async readText(element: FakeElement): Promise<string> {
    return element.text;
  }

  async readAttribute(element: FakeElement, name: string): Promise<string | null> {
    return element.attributes[name] ?? null;
  }

  async screenshot(path: string): Promise<void> {
    if (this.failScreenshots) {
      throw new Error("screenshot failed");
    }
    this.screenshots.push(path);
  }

  async wait(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.waits.push(ms);
    this.clockMs += ms;
    this.onWait?.(this);
  }

  currentUrl(): string {
    return this.url;
  }

  async pageText(): Promise<string> {
    return this.bodyText;
  }

  async setInputFiles(element: FakeElement, paths: string[]): Promise<void> {
    this.actions.push(`upload ${element.selector} ${paths.join(",")}`);
  }

  async saveDownload(element: FakeElement, path: string): Promise<void> {
    this.actions.push(`download ${element.selector} ${path}`);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function readCatalogJson(): unknown {
  return JSON.parse(readFileSync(catalogPath, "utf8"));
}

type ChainOverrides = Partial<Record<ProbeChainName, ParsedProbeCatalog["chains"][string]>>;

/**
 * Catalog whose chains each hold one probe with the chain name as selector,
 * and the shipped noise lists. Title lookups match on text.
 */
export function testCatalog(overrides: ChainOverrides = {}): ProbeCatalog {
  const shipped = parseProbeCatalog(readCatalogJson());
  const chains: ParsedProbeCatalog["chains"] = {};
  for (const name of probeChainNames) {
    chains[name] = [{ selector: name }];
  }
  chains.notebookByTitle = [{ selector: "notebook", hasText: "{short}" }];
  chains.sourceByTitle = [{ selector: "source", hasText: "{short}" }];
  chains.searchResultByTitle = [{ selector: "result", hasText: "{short}" }];
  for (const [name, probes] of Object.entries(overrides)) {
    if (probes) {
      chains[name] = probes;
    }
  }
  return new ProbeCatalog({ version: 1, chains, noise: shipped.noise });
}

/**
 * Session context around a fake page, as the orchestrator would hand it to a
 * workflow. Config comes from defaults only.
 */
export function fakeContext(
  page: FakePage,
  options: { catalog?: ProbeCatalog; config?: ConfigInput; signal?: AbortSignal } = {}
): SessionContext<FakeElement> {
  const config = resolveConfig({ homeDir: "/tmp/nbpilot-test", ...options.config }, { env: {}, exists: () => false });
  return {
    config,
    catalog: options.catalog ?? testCatalog(),
    driver: page,
    logger: silentLogger(),
    lock: {
      lockPath: join(config.homeDir, "test.lock"),
      token: "test-token",
      pid: process.pid,
      acquiredAt: 0,
      timeoutMs: 0,
      released: false
    },
    signal: options.signal
  };
}
