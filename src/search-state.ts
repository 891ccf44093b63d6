import type { ProbeCatalog } from "./catalog.js";
import { PreconditionViolationError } from "./errors.js";
import type { NbLogger } from "./logger.js";
import { anyVisible, resolveAll, resolveProbeChain } from "./probe.js";
import {
  parseResultRow,
  resultTitlesFromPanelText,
  searchResultsFromPageText,
  searchResultsFromTitleTexts,
  uniqueCapped
} from "./text-heuristics.js";
import type { PageDriver, SearchCompletionSignal, SearchOutcome, SearchResultEntry, SearchState } from "./types.js";

export interface SearchStateMachineOptions {
  pollIntervalMs: number;
  settleMs: number;
  maxResults: number;
  logger?: NbLogger;
  signal?: AbortSignal;
}

export type SearchWaitOutcome = Omit<SearchOutcome, "results">;

const CLICK_SETTLE_MS = 500;
const DISCARD_SETTLE_MS = 1_000;
const VIEW_GRACE_MS = 5_000;
const PROGRESS_LOG_EVERY_TICKS = 10;

/**
 * The source-search surface holds at most one batch of results. A finished
 * search leaves them pending until they are imported, removed or discarded, and
 * the search input stays hidden until then.
 */
export class SearchStateMachine<E> {
  constructor(
    private readonly driver: PageDriver<E>,
    private readonly catalog: ProbeCatalog,
    private readonly options: SearchStateMachineOptions
  ) {}

  async detect(): Promise<SearchState> {
    if (await anyVisible(this.catalog.chain("pendingResults"), this.driver)) {
      return "PENDING_RESULTS";
    }
    if (await anyVisible(this.catalog.chain("searchInput"), this.driver)) {
      return "READY";
    }
    return "UNKNOWN";
  }

  async clearPending(): Promise<boolean> {
    const state = await this.detect();
    this.options.logger?.debug(`Search state before clearing: ${state}`);
    if (state === "READY") {
      return true;
    }
    if (state === "UNKNOWN") {
      this.options.logger?.warn("No pending search results to clear");
      return false;
    }

    const discard = await resolveProbeChain(this.catalog.chain("discardResults"), this.driver);
    if (discard === undefined) {
      this.options.logger?.warn("Discard control for pending results not found; pressing Escape");
      await this.driver.pressKey(null, "Escape");
      await this.pause(CLICK_SETTLE_MS);
      return false;
    }

    await this.driver.click(discard);
    await this.pause(DISCARD_SETTLE_MS);

    const confirm = await resolveProbeChain(this.catalog.chain("discardConfirm"), this.driver);
    if (confirm !== undefined) {
      await this.driver.click(confirm);
    }
    await this.pause(this.options.settleMs);

    const after = await this.detect();
    if (after === "READY") {
      this.options.logger?.info("Pending search results cleared");
      return true;
    }
    this.options.logger?.warn(`Search state after clearing: ${after}`);
    return after !== "PENDING_RESULTS";
  }

  /**
   * Brings the surface to READY or throws. UNKNOWN gets one attempt at opening
   * the search surface through the add-source control.
   */
  async ensureReady(options: { autoClear: boolean; operation?: string }): Promise<void> {
    const operation = options.operation ?? "start a source search";
    let state = await this.detect();
    if (state === "READY") {
      return;
    }

    if (state === "PENDING_RESULTS") {
      if (!options.autoClear) {
        throw new PreconditionViolationError(
          operation,
          state,
          "import, remove or clear the pending results first (clear-search)"
        );
      }
      if (!(await this.clearPending())) {
        throw new PreconditionViolationError(operation, state, "pending results could not be cleared");
      }
      state = await this.detect();
      if (state === "READY") {
        return;
      }
    }

    const addSource = await resolveProbeChain(this.catalog.chain("addSource"), this.driver);
    if (addSource !== undefined) {
      this.options.logger?.debug("Search input hidden; opening the add-source surface");
      await this.driver.click(addSource);
      await this.pause(this.options.settleMs);
      state = await this.detect();
      if (state === "READY") {
        return;
      }
    }
    throw new PreconditionViolationError(operation, state, "the search input is not available");
  }

  /**
   * Polls until the search reports completion or the budget runs out. A
   * visible loading indicator always means "still running", whatever else is
   * on screen.
   */
  async waitForCompletion(budgetMs: number): Promise<SearchWaitOutcome> {
    const interval = this.options.pollIntervalMs;
    let elapsedMs = 0;
    let ticks = 0;

    while (elapsedMs < budgetMs) {
      await this.pause(interval);
      elapsedMs += interval;
      ticks += 1;

      if (await anyVisible(this.catalog.chain("searchLoading"), this.driver)) {
        if (ticks % PROGRESS_LOG_EVERY_TICKS === 0) {
          this.options.logger?.info(`Searching... (${Math.round(elapsedMs / 1000)}s)`);
        }
        continue;
      }

      const signal = await this.completionSignal();
      if (signal) {
        this.options.logger?.info(`Search complete after ${Math.round(elapsedMs / 1000)}s (${signal})`);
        return { status: "complete", elapsedMs, signal };
      }

      if (ticks % PROGRESS_LOG_EVERY_TICKS === 0) {
        const progress = `${Math.round(elapsedMs / 1000)}/${Math.round(budgetMs / 1000)}s`;
        this.options.logger?.info(`Waiting for search results... (${progress})`);
      }
    }

    this.options.logger?.warn(`Search did not report completion within ${Math.round(budgetMs / 1000)}s`);
    return { status: "timed_out", elapsedMs };
  }

  /**
   * Result titles currently on screen: page-text heuristic first, then the
   * result title elements.
   */
  async collectResults(): Promise<string[]> {
    const noise = this.catalog.noise;
    const fromText = searchResultsFromPageText(await this.driver.pageText().catch(() => ""), noise);
    if (fromText.length > 0) {
      return uniqueCapped(fromText, this.options.maxResults);
    }

    const titles = await resolveAll(this.catalog.chain("searchResultTitles"), this.driver);
    if (!titles) {
      return [];
    }
    const texts = await this.readTexts(titles.elements);
    return uniqueCapped(searchResultsFromTitleTexts(texts, noise), this.options.maxResults);
  }

  async viewResults(): Promise<boolean> {
    if (!(await anyVisible(this.catalog.chain("searchCompleteBanner"), this.driver))) {
      this.options.logger?.info("Search has not reported completion yet; waiting briefly");
      await this.pause(VIEW_GRACE_MS);
    }

    const view = await resolveProbeChain(this.catalog.chain("viewResults"), this.driver);
    if (view === undefined) {
      this.options.logger?.warn("View-results control not found");
      return false;
    }
    await this.driver.click(view);
    await this.pause(this.options.settleMs);
    return true;
  }

  async listResultEntries(): Promise<SearchResultEntry[]> {
    const noise = this.catalog.noise;
    const canImport = await anyVisible(this.catalog.chain("importResult"), this.driver);
    const entries: SearchResultEntry[] = [];
    const seen = new Set<string>();

    const rows = await resolveAll(this.catalog.chain("searchResultRows"), this.driver);
    for (const text of await this.readTexts(rows?.elements ?? [])) {
      const parsed = parseResultRow(text, noise);
      if (parsed && !seen.has(parsed.title)) {
        seen.add(parsed.title);
        entries.push({ ...parsed, canImport, canRemove: true });
      }
    }
    if (entries.length > 0) {
      return entries;
    }

    const panel = await resolveProbeChain(this.catalog.chain("searchResultPanel"), this.driver);
    if (panel === undefined) {
      return entries;
    }
    const panelText = await this.driver.readText(panel).catch(() => "");
    return resultTitlesFromPanelText(panelText, noise).map((title) => ({
      title,
      sourceType: "unknown",
      canImport,
      canRemove: true
    }));
  }

  importResult(title: string): Promise<boolean> {
    return this.actOnResult(title, "importResult", "Imported");
  }

  removeResult(title: string): Promise<boolean> {
    return this.actOnResult(title, "removeResult", "Removed");
  }

  private async actOnResult(
    title: string,
    action: "importResult" | "removeResult",
    verb: string
  ): Promise<boolean> {
    const chain = this.catalog.bound("searchResultByTitle", {
      title: title.slice(0, 50),
      short: title.slice(0, 30)
    });
    const result = await resolveProbeChain(chain, this.driver);
    if (result === undefined) {
      this.options.logger?.warn(`Search result not found: ${title}`);
      return false;
    }
    await this.driver.click(result);
    await this.pause(CLICK_SETTLE_MS);

    const control = await resolveProbeChain(this.catalog.chain(action), this.driver);
    if (control === undefined) {
      this.options.logger?.warn(`No ${action === "importResult" ? "import" : "remove"} control for: ${title}`);
      return false;
    }
    await this.driver.click(control);
    await this.pause(this.options.settleMs);
    this.options.logger?.info(`${verb}: ${title.slice(0, 50)}`);
    return true;
  }

  private async completionSignal(): Promise<SearchCompletionSignal | undefined> {
    if (await anyVisible(this.catalog.chain("pendingResults"), this.driver)) {
      return "pending_results";
    }
    if (await anyVisible(this.catalog.chain("searchCompleteBanner"), this.driver)) {
      return "completion_banner";
    }
    if (await anyVisible(this.catalog.chain("searchResultTitles"), this.driver)) {
      return "result_titles";
    }
    return undefined;
  }

  private async readTexts(elements: E[]): Promise<string[]> {
    const texts: string[] = [];
    for (const element of elements) {
      const text = await this.driver.readText(element).catch(() => "");
      if (text.trim()) {
        texts.push(text);
      }
    }
    return texts;
  }

  private pause(ms: number): Promise<void> {
    return this.driver.wait(ms, this.options.signal);
  }
}
