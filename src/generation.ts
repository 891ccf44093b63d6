import type { ProbeCatalog } from "./catalog.js";
import type { NoiseLists } from "./contracts.js";
import type { NbLogger } from "./logger.js";
import { anyVisible, visibleCandidates } from "./probe.js";
import { isPendingResponse } from "./text-heuristics.js";
import type {
  GenerationObservation,
  GenerationOutcome,
  GenerationSession,
  PageDriver,
  ProbeChain
} from "./types.js";

export interface GenerationThresholds {
  lowStableTicks: number;
  highStableTicks: number;
  minTextLength: number;
}

export interface GenerationOptions extends GenerationThresholds {
  cadenceMs: number;
  maxWaitMs: number;
  startWaitMs: number;
  settleMs: number;
  extendMs: number;
  logger?: NbLogger;
}

/** What the detector reads from the page on each tick. */
export interface GenerationSignals {
  inProgress(): Promise<boolean>;
  loading(): Promise<boolean>;
  responseText(): Promise<string>;
}

export type Waiter = (ms: number) => Promise<void>;

const MIN_STARTED_TEXT_LENGTH = 20;
const MIN_RESPONSE_LENGTH = 30;

export function createGenerationSession(): GenerationSession {
  return { lastText: "", stableCount: 0, elapsedMs: 0, ticks: 0, sawInProgress: false };
}

/**
 * One detector tick. Text counts as stable when it is long enough and equal to
 * the previous tick's text; in-progress and loading signals only gate the low
 * threshold and never reset the counter.
 */
export function observeTick(
  session: GenerationSession,
  observation: GenerationObservation,
  thresholds: GenerationThresholds,
  cadenceMs = 0
): { session: GenerationSession; complete: boolean } {
  const next: GenerationSession = {
    ...session,
    ticks: session.ticks + 1,
    elapsedMs: session.elapsedMs + cadenceMs,
    sawInProgress: session.sawInProgress || observation.inProgress
  };

  const substantive = observation.text.length > thresholds.minTextLength;
  if (!substantive) {
    next.stableCount = 0;
    return { session: next, complete: false };
  }

  if (observation.text === session.lastText) {
    next.stableCount = session.stableCount + 1;
  } else {
    next.stableCount = 0;
    next.lastText = observation.text;
  }

  const quiet = !observation.inProgress && !observation.loading;
  const complete =
    (quiet && next.stableCount >= thresholds.lowStableTicks) || next.stableCount >= thresholds.highStableTicks;
  return { session: next, complete };
}

/**
 * Waits for a streamed response to finish. Never throws on budget exhaustion;
 * the outcome is tagged `timed_out` and carries the best text seen.
 */
export async function waitForGeneration(
  signals: GenerationSignals,
  wait: Waiter,
  options: GenerationOptions
): Promise<GenerationOutcome> {
  const logger = options.logger;

  const start = await waitForStart(signals, wait, options);
  if (!start.started) {
    logger?.warn(`Generation did not visibly start within ${Math.round(start.elapsedMs / 1000)}s; still waiting`);
  }

  // The start phase spends the same budget as the detector loop.
  let session: GenerationSession = { ...createGenerationSession(), elapsedMs: start.elapsedMs };
  let complete = false;

  while (session.elapsedMs < options.maxWaitMs) {
    await wait(options.cadenceMs);
    const observation: GenerationObservation = {
      inProgress: await signals.inProgress(),
      loading: await signals.loading(),
      text: await signals.responseText()
    };
    const step = observeTick(session, observation, options, options.cadenceMs);
    session = step.session;

    if (step.complete) {
      complete = true;
      logger?.info(`Response complete after ${Math.round(session.elapsedMs / 1000)}s (stable ${session.stableCount})`);
      break;
    }
    if (session.ticks % 15 === 0) {
      logger?.debug(
        `Generating... ${Math.round(session.elapsedMs / 1000)}s, ` +
          `${observation.text.length} chars, stable ${session.stableCount}`
      );
    }
  }

  if (!complete) {
    const latest = await signals.responseText();
    logger?.warn(`Response still changing after ${Math.round(options.maxWaitMs / 1000)}s; returning what is there`);
    return outcome("timed_out", latest || session.lastText, session);
  }

  let text = session.lastText;
  await wait(options.settleMs);
  const reread = await signals.responseText();
  if (reread && reread !== text) {
    logger?.info("Response changed after completion; waiting once more");
    await wait(options.extendMs);
    text = (await signals.responseText()) || reread;
  }
  return outcome("complete", text, session);
}

async function waitForStart(
  signals: GenerationSignals,
  wait: Waiter,
  options: GenerationOptions
): Promise<{ started: boolean; elapsedMs: number }> {
  const ticks = Math.floor(Math.min(options.startWaitMs, options.maxWaitMs) / options.cadenceMs);
  let elapsedMs = 0;
  for (let tick = 0; tick < ticks; tick += 1) {
    await wait(options.cadenceMs);
    elapsedMs += options.cadenceMs;
    if (await signals.inProgress()) {
      return { started: true, elapsedMs };
    }
    if ((await signals.responseText()).length > MIN_STARTED_TEXT_LENGTH) {
      return { started: true, elapsedMs };
    }
  }
  return { started: false, elapsedMs };
}

function outcome(status: GenerationOutcome["status"], text: string, session: GenerationSession): GenerationOutcome {
  return {
    status,
    text,
    elapsedMs: session.elapsedMs,
    ticks: session.ticks,
    stableCount: session.stableCount,
    sawInProgress: session.sawInProgress
  };
}

/**
 * Latest substantive response: the last readable element of the first probe
 * that has one, skipping context-loading placeholders.
 */
export async function extractLatestResponse<E>(
  driver: PageDriver<E>,
  chain: ProbeChain,
  noise: NoiseLists,
  minLength = MIN_RESPONSE_LENGTH
): Promise<string> {
  for (const probe of chain.probes) {
    const candidates = await visibleCandidates(probe, driver);
    for (const candidate of candidates) {
      const text = (await driver.readText(candidate).catch(() => "")).trim();
      if (text.length > minLength && !isPendingResponse(text, noise)) {
        return text;
      }
    }
  }
  return "";
}

export function createGenerationSignals<E>(driver: PageDriver<E>, catalog: ProbeCatalog): GenerationSignals {
  return {
    inProgress: () => anyVisible(catalog.chain("generationInProgress"), driver),
    loading: () => anyVisible(catalog.chain("generationLoading"), driver),
    responseText: () => extractLatestResponse(driver, catalog.chain("responseMessages"), catalog.noise)
  };
}
