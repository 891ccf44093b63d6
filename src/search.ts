import { pause } from "./auth.js";
import { searchTimeoutFor } from "./config.js";
import { type ProbeChainName, researchModeChainName, sourceTypeChainName } from "./contracts.js";
import { openNotebook } from "./notebooks.js";
import { requireProbe } from "./probe.js";
import { SearchStateMachine } from "./search-state.js";
import type { SessionContext } from "./session.js";
import type { ResearchMode, SearchOutcome, SearchResultEntry, SearchState, SourceType } from "./types.js";

const NOTEBOOK_SETTLE_MS = 3_000;
const MENU_SETTLE_MS = 1_000;
const OPTION_SETTLE_MS = 500;

export interface SearchSourcesOptions {
  mode?: ResearchMode;
  sourceType?: SourceType;
  autoClear?: boolean;
  timeoutMs?: number;
}

export function searchStateMachine<E>(context: SessionContext<E>): SearchStateMachine<E> {
  const { config } = context;
  return new SearchStateMachine(context.driver, context.catalog, {
    pollIntervalMs: config.search.pollIntervalMs,
    settleMs: config.search.settleMs,
    maxResults: config.search.maxResults,
    logger: context.logger.getSubLogger({ name: "search" }),
    signal: context.signal
  });
}

async function openForSearch<E>(context: SessionContext<E>, notebook: string): Promise<SearchStateMachine<E>> {
  await openNotebook(context, notebook);
  await pause(context, NOTEBOOK_SETTLE_MS);
  return searchStateMachine(context);
}

async function pickMenuOption<E>(
  context: SessionContext<E>,
  menu: "sourceTypeMenu" | "researchModeMenu",
  option: ProbeChainName,
  description: string
): Promise<boolean> {
  const { driver, catalog, logger } = context;
  const trigger = await driver.probe(catalog.chain(menu));
  if (trigger === undefined) {
    logger.warn(`Menu for ${description} not found`);
    return false;
  }
  await driver.click(trigger);
  await pause(context, MENU_SETTLE_MS);

  const choice = await driver.probe(catalog.chain(option));
  if (choice === undefined) {
    await driver.pressKey(null, "Escape");
    logger.warn(`Option not found: ${description}`);
    return false;
  }
  await driver.click(choice);
  await pause(context, OPTION_SETTLE_MS);
  logger.info(`Selected ${description}`);
  return true;
}

export function selectSourceType<E>(context: SessionContext<E>, sourceType: SourceType): Promise<boolean> {
  return pickMenuOption(context, "sourceTypeMenu", sourceTypeChainName(sourceType), `source type ${sourceType}`);
}

export function selectResearchMode<E>(context: SessionContext<E>, mode: ResearchMode): Promise<boolean> {
  return pickMenuOption(context, "researchModeMenu", researchModeChainName(mode), `research mode ${mode}`);
}

/**
 * Runs one source search end to end. The results it finds stay pending on the
 * page until they are imported, removed or cleared; the next search needs the
 * surface back in READY.
 */
export async function searchSources<E>(
  context: SessionContext<E>,
  notebook: string,
  query: string,
  options: SearchSourcesOptions = {}
): Promise<SearchOutcome> {
  const { driver, catalog, config, logger } = context;
  const mode = options.mode ?? "fast";
  const sourceType = options.sourceType ?? "web";

  const machine = await openForSearch(context, notebook);
  await machine.ensureReady({ autoClear: options.autoClear ?? true });

  // The defaults are preselected; opening their menus only costs time.
  if (sourceType !== "web") {
    await selectSourceType(context, sourceType);
  }
  if (mode !== "fast") {
    await selectResearchMode(context, mode);
  }

  const input = await requireProbe(catalog.chain("searchInput"), driver);
  await pause(context, MENU_SETTLE_MS);
  await driver.click(input);
  await pause(context, OPTION_SETTLE_MS);
  await driver.fill(input, query);
  await pause(context, OPTION_SETTLE_MS);

  const submit = await driver.probe(catalog.chain("searchSubmit"));
  if (submit !== undefined) {
    await driver.click(submit);
  } else {
    await driver.pressKey(input, "Enter");
  }
  logger.info(`Submitted ${mode} search: ${query}`);

  const waited = await machine.waitForCompletion(options.timeoutMs ?? searchTimeoutFor(config, mode));
  const results = await machine.collectResults();
  logger.info(`Found ${results.length} results; they stay pending until imported, removed or cleared`);
  return { ...waited, results };
}

export interface ViewResultsOutcome {
  opened: boolean;
  entries: SearchResultEntry[];
}

export async function viewSearchResults<E>(context: SessionContext<E>, notebook: string): Promise<ViewResultsOutcome> {
  const machine = await openForSearch(context, notebook);
  if (!(await machine.viewResults())) {
    return { opened: false, entries: [] };
  }
  return { opened: true, entries: await machine.listResultEntries() };
}

export async function importSearchResult<E>(
  context: SessionContext<E>,
  notebook: string,
  title: string
): Promise<boolean> {
  const machine = await openForSearch(context, notebook);
  return machine.importResult(title);
}

export async function removeSearchResult<E>(
  context: SessionContext<E>,
  notebook: string,
  title: string
): Promise<boolean> {
  const machine = await openForSearch(context, notebook);
  return machine.removeResult(title);
}

export async function clearSearch<E>(context: SessionContext<E>, notebook: string): Promise<boolean> {
  const machine = await openForSearch(context, notebook);
  return machine.clearPending();
}

export async function detectSearchState<E>(context: SessionContext<E>, notebook: string): Promise<SearchState> {
  const machine = await openForSearch(context, notebook);
  return machine.detect();
}
