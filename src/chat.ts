import { pause } from "./auth.js";
import { createGenerationSignals, waitForGeneration } from "./generation.js";
import { openNotebook } from "./notebooks.js";
import { anyVisible, requireProbe, resolveAll } from "./probe.js";
import { searchStateMachine } from "./search.js";
import type { SessionContext } from "./session.js";
import { dedupeHistory, historyFromElements, historyFromPageText, responseAfterMarker } from "./text-heuristics.js";
import type { ChatMessage, GenerationOutcome, UiMode } from "./types.js";

const NOTEBOOK_SETTLE_MS = 3_000;
const DIALOG_SETTLE_MS = 2_000;

export interface SmartChatOptions {
  maxWaitMs?: number;
  ensureChatMode?: boolean;
}

export async function detectMode<E>(context: SessionContext<E>): Promise<UiMode> {
  const { driver, catalog } = context;
  if (await anyVisible(catalog.chain("sourceSearchModeInput"), driver)) {
    return "source_search";
  }
  if (await anyVisible(catalog.chain("chatInput"), driver)) {
    return "chat";
  }
  return "unknown";
}

/**
 * Asks a question and waits for the streamed answer to settle. A source-search
 * surface left open is cleared first so the question lands in the chat input.
 */
export async function smartChat<E>(
  context: SessionContext<E>,
  notebook: string,
  question: string,
  options: SmartChatOptions = {}
): Promise<GenerationOutcome> {
  const { driver, catalog, config, logger } = context;
  await openNotebook(context, notebook);
  await pause(context, NOTEBOOK_SETTLE_MS);

  if ((options.ensureChatMode ?? true) && (await detectMode(context)) === "source_search") {
    logger.info("Source search is open; clearing it before chatting");
    await searchStateMachine(context).clearPending();
    await pause(context, 1_000);
  }

  const input = await requireProbe(catalog.chain("chatInput"), driver);
  await driver.click(input);
  await pause(context, 300);
  await driver.fill(input, question);
  await pause(context, 500);
  await driver.pressKey(input, "Enter");

  const maxWaitMs = options.maxWaitMs ?? config.generation.maxWaitMs;
  logger.info(`Question sent; waiting up to ${Math.round(maxWaitMs / 1000)}s for the answer`);
  const outcome = await waitForGeneration(
    createGenerationSignals(driver, catalog),
    (ms) => driver.wait(ms, context.signal),
    { ...config.generation, maxWaitMs, logger: logger.getSubLogger({ name: "generation" }) }
  );

  if (outcome.text) {
    return outcome;
  }

  const area = await driver.probe(catalog.chain("chatArea"));
  const areaText = area === undefined ? "" : await driver.readText(area).catch(() => "");
  return { ...outcome, text: responseAfterMarker(areaText, catalog.noise) };
}

export function chat<E>(context: SessionContext<E>, notebook: string, question: string): Promise<GenerationOutcome> {
  return smartChat(context, notebook, question);
}

export async function saveResponseAsNote<E>(context: SessionContext<E>): Promise<boolean> {
  const { driver, catalog, logger } = context;
  const save = await driver.probe(catalog.chain("saveAsNote"));
  if (save === undefined) {
    logger.warn("Save-as-note control not found");
    return false;
  }
  await driver.click(save);
  await pause(context, DIALOG_SETTLE_MS);
  logger.info("Response saved as a note");
  return true;
}

export function formatNote(content: string, title?: string): string {
  return title ? `# ${title}\n\n${content}` : content;
}

export async function saveNote<E>(
  context: SessionContext<E>,
  notebook: string,
  content: string,
  title?: string
): Promise<void> {
  const { driver, catalog, logger } = context;
  await openNotebook(context, notebook);
  await pause(context, NOTEBOOK_SETTLE_MS);

  const add = await driver.probe(catalog.chain("addNote"));
  if (add !== undefined) {
    await driver.click(add);
    await pause(context, 1_000);
  }

  const input = await requireProbe(catalog.chain("noteInput"), driver);
  await driver.fill(input, formatNote(content, title));
  await pause(context, 500);

  const save = await driver.probe(catalog.chain("noteSave"));
  if (save !== undefined) {
    await driver.click(save);
  } else {
    await driver.pressKey(input, "Control+Enter");
  }
  await pause(context, DIALOG_SETTLE_MS);
  logger.info(`Note saved: ${title ?? "(untitled)"}`);
}

/**
 * Conversation turns from the message elements, or from the page text when
 * none can be read. Deduplicated on the first 100 characters.
 */
export async function chatHistory<E>(
  context: SessionContext<E>,
  notebook: string,
  limit = 20
): Promise<ChatMessage[]> {
  const { driver, catalog } = context;
  await openNotebook(context, notebook);
  await pause(context, NOTEBOOK_SETTLE_MS);

  const messages = await resolveAll(catalog.chain("chatMessages"), driver);
  const texts: string[] = [];
  for (const element of messages?.elements ?? []) {
    texts.push(await driver.readText(element).catch(() => ""));
  }

  let history = historyFromElements(texts, catalog.noise);
  if (history.length === 0) {
    history = historyFromPageText(await driver.pageText().catch(() => ""), catalog.noise);
  }
  return dedupeHistory(history, limit);
}
