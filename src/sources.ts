import { pause } from "./auth.js";
import { debugScreenshot, openNotebook } from "./notebooks.js";
import { requireProbe, resolveAll, visibleCandidates } from "./probe.js";
import type { SessionContext } from "./session.js";
import { sourceNamesFromItems, sourceNamesFromPanelText } from "./text-heuristics.js";
import type { ProbeChain, SourceDetails } from "./types.js";

const NOTEBOOK_SETTLE_MS = 3_000;
const CLICK_SETTLE_MS = 1_000;
const DETAIL_SETTLE_MS = 2_000;
const PREVIEW_LIMIT = 500;

function sourceChain<E>(context: SessionContext<E>, name: string): ProbeChain {
  return context.catalog.bound("sourceByTitle", { title: name, short: name.slice(0, 30) });
}

/**
 * Source titles in the panel. Each item probe is tried on its own because the
 * broad fallbacks also match panel chrome; the first one that yields a real
 * name wins.
 */
export async function listSources<E>(context: SessionContext<E>, notebook: string): Promise<string[]> {
  const { driver, catalog } = context;
  await openNotebook(context, notebook);
  await pause(context, NOTEBOOK_SETTLE_MS);

  for (const probe of catalog.chain("sourceItems").probes) {
    const items = await visibleCandidates(probe, driver);
    const texts: string[] = [];
    for (const item of items) {
      texts.push(await driver.readText(item).catch(() => ""));
    }
    const names = sourceNamesFromItems(texts, catalog.noise);
    if (names.length > 0) {
      return names;
    }
  }

  const panel = await resolveAll(catalog.chain("sourcePanel"), driver);
  const [panelElement] = panel?.elements ?? [];
  if (panelElement !== undefined) {
    const names = sourceNamesFromPanelText(await driver.readText(panelElement).catch(() => ""), catalog.noise);
    if (names.length > 0) {
      return names;
    }
  }

  await debugScreenshot(context, "sources");
  return [];
}

export async function deleteSource<E>(context: SessionContext<E>, notebook: string, name: string): Promise<boolean> {
  const { driver, catalog, logger } = context;
  await openNotebook(context, notebook);
  await pause(context, NOTEBOOK_SETTLE_MS);

  const source = await driver.probe(sourceChain(context, name));
  if (source === undefined) {
    logger.warn(`Source not found: ${name}`);
    return false;
  }

  await driver.click(source, { button: "right" });
  await pause(context, CLICK_SETTLE_MS);
  const menuItem = await driver.probe(catalog.chain("sourceDeleteMenuItem"));
  if (menuItem !== undefined) {
    await driver.click(menuItem);
    await pause(context, CLICK_SETTLE_MS);
    const confirm = await driver.probe(catalog.chain("sourceDeleteConfirm"));
    if (confirm !== undefined) {
      await driver.click(confirm);
      await pause(context, DETAIL_SETTLE_MS);
    }
    logger.info(`Deleted source: ${name}`);
    return true;
  }

  // No context menu; some layouts show a delete icon on the selected row.
  await driver.pressKey(null, "Escape");
  await driver.click(source);
  await pause(context, CLICK_SETTLE_MS);
  const icon = await driver.probe(catalog.chain("sourceDeleteIcon"));
  if (icon === undefined) {
    logger.warn(`No delete control for source: ${name}`);
    return false;
  }
  await driver.click(icon);
  await pause(context, DETAIL_SETTLE_MS);
  logger.info(`Deleted source: ${name}`);
  return true;
}

export async function inspectSource<E>(
  context: SessionContext<E>,
  notebook: string,
  name: string
): Promise<SourceDetails> {
  const { driver, catalog } = context;
  await openNotebook(context, notebook);
  await pause(context, NOTEBOOK_SETTLE_MS);

  await driver.click(await requireProbe(sourceChain(context, name), driver));
  await pause(context, DETAIL_SETTLE_MS);

  const details: SourceDetails = { title: name, type: "", preview: "", url: "" };
  const typeLabel = await driver.probe(catalog.chain("sourceTypeLabel"));
  if (typeLabel !== undefined) {
    details.type = (await driver.readText(typeLabel).catch(() => "")).trim();
  }
  const preview = await driver.probe(catalog.chain("sourcePreview"));
  if (preview !== undefined) {
    details.preview = (await driver.readText(preview).catch(() => "")).trim().slice(0, PREVIEW_LIMIT);
  }
  const link = await driver.probe(catalog.chain("sourceLink"));
  if (link !== undefined) {
    details.url = (await driver.readAttribute(link, "href").catch(() => null)) ?? "";
  }
  return details;
}
