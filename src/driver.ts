import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import {
  chromium,
  firefox,
  webkit,
  type Browser,
  type BrowserContext,
  type BrowserType,
  type Locator,
  type Page
} from "playwright-core";
import { resolveProbeChain } from "./probe.js";
import type { ClickOptions, DriverLaunchOptions, EngineType, PageDriver, ProbeChain, ProbeSpec } from "./types.js";

const CHROMIUM_ARGS = ["--disable-blink-features=AutomationControlled", "--no-first-run", "--no-default-browser-check"];
const LINUX_CHROMIUM_ARGS = ["--no-sandbox", "--disable-setuid-sandbox"];

interface BrowserOwnership {
  context: BrowserContext;
  browser: Browser | null;
  /** False when attached over CDP to a browser the user runs. */
  ownsContext: boolean;
}

export class PlaywrightPageDriver implements PageDriver<Locator> {
  private closed = false;

  constructor(
    private readonly page: Page,
    private readonly ownership: BrowserOwnership
  ) {}

  async queryAll(probe: ProbeSpec): Promise<Locator[]> {
    const base = this.page.locator(probe.selector);
    const locator = probe.hasText === undefined ? base : base.filter({ hasText: toTextMatcher(probe.hasText) });
    return locator.all();
  }

  isVisible(element: Locator): Promise<boolean> {
    return element.isVisible();
  }

  probe(chain: ProbeChain): Promise<Locator | undefined> {
    return resolveProbeChain(chain, this);
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  async click(element: Locator, options: ClickOptions = {}): Promise<void> {
    await element.click({ force: options.force, button: options.button });
  }

  async fill(element: Locator, text: string): Promise<void> {
    await element.fill(text);
  }

  async pressKey(target: Locator | null, key: string): Promise<void> {
    if (target) {
      await target.press(key);
      return;
    }
    await this.page.keyboard.press(key);
  }

  readText(element: Locator): Promise<string> {
    return element.innerText();
  }

  readAttribute(element: Locator, name: string): Promise<string | null> {
    return element.getAttribute(name);
  }

  async screenshot(path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await this.page.screenshot({ path });
  }

  async wait(ms: number, signal?: AbortSignal): Promise<void> {
    await sleep(ms, undefined, { signal });
  }

  currentUrl(): string {
    try {
      return this.page.url();
    } catch {
      return "";
    }
  }

  pageText(): Promise<string> {
    return this.page.locator("body").innerText();
  }

  async setInputFiles(element: Locator, paths: string[]): Promise<void> {
    await element.setInputFiles(paths);
  }

  async saveDownload(element: Locator, path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const [download] = await Promise.all([this.page.waitForEvent("download"), element.click()]);
    await download.saveAs(path);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.ownership.ownsContext) {
      await this.ownership.context.close();
    }
    // For a CDP attachment this only disconnects; the user's browser keeps running.
    await this.ownership.browser?.close();
  }
}

/**
 * `/pattern/flags` is a regular expression; anything else is a substring.
 */
export function toTextMatcher(hasText: string): string | RegExp {
  const literal = /^\/(.+)\/([dgimsuy]*)$/.exec(hasText);
  if (!literal) {
    return hasText;
  }
  try {
    return new RegExp(literal[1] ?? "", literal[2]);
  } catch {
    return hasText;
  }
}

export function chromiumArgs(platform: NodeJS.Platform = process.platform): string[] {
  return platform === "linux" ? [...CHROMIUM_ARGS, ...LINUX_CHROMIUM_ARGS] : [...CHROMIUM_ARGS];
}

function engineFor(engine: EngineType): BrowserType {
  switch (engine) {
    case "webkit":
      return webkit;
    case "firefox":
      return firefox;
    default:
      return chromium;
  }
}

/**
 * Opens a page either in a persistent context on the given profile directory
 * or, with `cdpUrl`, in a browser that is already running.
 */
export async function launchPlaywrightDriver(options: DriverLaunchOptions): Promise<PlaywrightPageDriver> {
  if (options.cdpUrl) {
    const browser = await chromium.connectOverCDP(options.cdpUrl);
    const existing = browser.contexts()[0];
    const context = existing ?? (await browser.newContext());
    const page = context.pages()[0] ?? (await context.newPage());
    page.setDefaultTimeout(options.defaultTimeoutMs);
    return new PlaywrightPageDriver(page, { context, browser, ownsContext: existing === undefined });
  }

  const isChromium = options.engine === "chromium";
  const context = await engineFor(options.engine).launchPersistentContext(options.userDataDir ?? "", {
    headless: options.headless,
    viewport: { width: options.viewportWidth, height: options.viewportHeight },
    ...(isChromium
      ? {
          args: chromiumArgs(),
          ignoreDefaultArgs: ["--enable-automation"],
          executablePath: options.executablePath
        }
      : {})
  });
  const page = context.pages()[0] ?? (await context.newPage());
  page.setDefaultTimeout(options.defaultTimeoutMs);
  return new PlaywrightPageDriver(page, { context, browser: null, ownsContext: true });
}
