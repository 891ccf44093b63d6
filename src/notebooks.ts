import { stat } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { pause, requireSignedIn } from "./auth.js";
import { ProbeNotFoundError, describeError, isNbpilotError } from "./errors.js";
import { requireProbe, resolveAll } from "./probe.js";
import type { SessionContext } from "./session.js";
import { notebookTitlesFromCards, notebookTitlesFromPageText } from "./text-heuristics.js";
import type { ProbeChain } from "./types.js";

const CLICK_SETTLE_MS = 1_000;
const DIALOG_SETTLE_MS = 2_000;
const UPLOAD_SETTLE_MS = 3_000;

/**
 * Writes `<home>/debug_<name>.png` for a read that came back empty. Never
 * fails the workflow.
 */
export async function debugScreenshot<E>(context: SessionContext<E>, name: string): Promise<string | undefined> {
  const path = join(context.config.homeDir, `debug_${name}.png`);
  try {
    await context.driver.screenshot(path);
    context.logger.info(`Debug screenshot saved: ${path}`);
    return path;
  } catch (error) {
    context.logger.warn(`Could not save debug screenshot: ${describeError(error)}`);
    return undefined;
  }
}

function notebookChain<E>(context: SessionContext<E>, name: string): ProbeChain {
  return context.catalog.bound("notebookByTitle", { title: name, short: name.slice(0, 30) });
}

export async function listNotebooks<E>(context: SessionContext<E>): Promise<string[]> {
  const { driver, catalog } = context;
  await requireSignedIn(context);
  await pause(context, context.config.browser.navigationSettleMs);

  const cards = await resolveAll(catalog.chain("notebookCards"), driver);
  const cardTexts: string[] = [];
  for (const card of cards?.elements ?? []) {
    cardTexts.push(await driver.readText(card).catch(() => ""));
  }
  let titles = notebookTitlesFromCards(cardTexts, catalog.noise);

  if (titles.length === 0) {
    titles = notebookTitlesFromPageText(await driver.pageText().catch(() => ""), catalog.noise);
  }
  if (titles.length === 0) {
    await debugScreenshot(context, "notebooks");
  }
  return titles;
}

export async function openNotebook<E>(context: SessionContext<E>, name: string): Promise<void> {
  const { driver, logger } = context;
  await requireSignedIn(context);

  const chain = notebookChain(context, name);
  const notebook = await driver.probe(chain);
  if (notebook === undefined) {
    await debugScreenshot(context, "open_notebook");
    throw new ProbeNotFoundError(chain.name, chain.probes.map((probe) => probe.label));
  }
  // An overlay sometimes covers the card; skip actionability checks.
  await driver.click(notebook, { force: true });
  await pause(context, context.config.browser.navigationSettleMs);
  logger.info(`Opened notebook: ${name}`);
}

export async function createNotebook<E>(context: SessionContext<E>, name: string): Promise<void> {
  const { driver, catalog, logger } = context;
  await requireSignedIn(context);

  await driver.click(await requireProbe(catalog.chain("createNotebook"), driver));
  await pause(context, DIALOG_SETTLE_MS + CLICK_SETTLE_MS);

  const input = await driver.probe(catalog.chain("notebookNameInput"));
  if (input !== undefined) {
    await driver.fill(input, name);
    await pause(context, 500);
  }

  const confirm = await driver.probe(catalog.chain("createConfirm"));
  if (confirm !== undefined) {
    await driver.click(confirm);
  }
  await pause(context, DIALOG_SETTLE_MS);
  logger.info(`Created notebook: ${name}`);
}

export async function deleteNotebook<E>(context: SessionContext<E>, name: string): Promise<void> {
  const { driver, catalog, logger } = context;
  await requireSignedIn(context);

  const notebook = await requireProbe(notebookChain(context, name), driver);
  await driver.click(notebook, { button: "right" });
  await pause(context, CLICK_SETTLE_MS);

  await driver.click(await requireProbe(catalog.chain("notebookDeleteMenuItem"), driver));
  await pause(context, CLICK_SETTLE_MS);

  const confirm = await driver.probe(catalog.chain("notebookDeleteConfirm"));
  if (confirm !== undefined) {
    await driver.click(confirm);
  }
  await pause(context, DIALOG_SETTLE_MS);
  logger.info(`Deleted notebook: ${name}`);
}

export function expandHome(path: string): string {
  if (path === "~") {
    return homedir();
  }
  return path.startsWith("~/") ? join(homedir(), path.slice(2)) : path;
}

/**
 * Uploads through the file input when it is already attached, otherwise
 * through the upload control. An unknown notebook is created first.
 */
export async function uploadDocument<E>(
  context: SessionContext<E>,
  filePath: string,
  notebook?: string
): Promise<string> {
  const { driver, catalog, logger } = context;
  const absolutePath = resolve(expandHome(filePath));
  const info = await stat(absolutePath).catch(() => undefined);
  if (!info?.isFile()) {
    throw new Error(`File not found: ${absolutePath}`);
  }

  if (notebook) {
    try {
      await openNotebook(context, notebook);
    } catch (error) {
      if (!isNbpilotError(error) || error.code !== "PROBE_NOT_FOUND") {
        throw error;
      }
      logger.info(`Notebook '${notebook}' not found; creating it`);
      await createNotebook(context, notebook);
      await pause(context, DIALOG_SETTLE_MS);
    }
  } else {
    await requireSignedIn(context);
  }

  let input = await driver.probe(catalog.chain("fileInput"));
  if (input === undefined) {
    await driver.click(await requireProbe(catalog.chain("uploadTrigger"), driver));
    await pause(context, CLICK_SETTLE_MS);
    input = await requireProbe(catalog.chain("fileInput"), driver);
  }

  await driver.setInputFiles(input, [absolutePath]);
  await pause(context, UPLOAD_SETTLE_MS);
  logger.info(`Uploaded ${absolutePath}`);
  return absolutePath;
}

export interface AudioResult {
  ready: boolean;
  savedTo?: string;
  elapsedMs: number;
}

/**
 * Starts the audio overview and polls for its download control. Generation
 * takes minutes; the poll budget comes from config.
 */
export async function generateAudio<E>(
  context: SessionContext<E>,
  notebook: string,
  output?: string
): Promise<AudioResult> {
  const { driver, catalog, config, logger } = context;
  await openNotebook(context, notebook);

  await driver.click(await requireProbe(catalog.chain("audioOverview"), driver));
  await pause(context, DIALOG_SETTLE_MS);

  const generate = await driver.probe(catalog.chain("audioGenerate"));
  if (generate !== undefined) {
    await driver.click(generate);
  }
  logger.info("Audio generation started; this can take several minutes");

  let elapsedMs = 0;
  while (elapsedMs <= config.audio.maxWaitMs) {
    const download = await driver.probe(catalog.chain("audioDownload"));
    if (download !== undefined) {
      if (output) {
        const target = resolve(expandHome(output));
        await driver.saveDownload(download, target);
        logger.info(`Audio saved to ${target}`);
        return { ready: true, savedTo: target, elapsedMs };
      }
      await driver.click(download);
      logger.info("Audio download started");
      return { ready: true, elapsedMs };
    }

    await pause(context, config.audio.pollIntervalMs);
    elapsedMs += config.audio.pollIntervalMs;
    if (elapsedMs % 60_000 === 0) {
      logger.info(`Waiting for audio... (${elapsedMs / 1000}s)`);
    }
  }

  logger.warn(`Audio was not ready within ${Math.round(config.audio.maxWaitMs / 1000)}s`);
  return { ready: false, elapsedMs };
}
