import { ProbeNotFoundError } from "./errors.js";
import type { PageContext, ProbeChain, ProbeSpec } from "./types.js";

/**
 * Candidates of a single probe that count as present, in pick order. A
 * candidate whose visibility check throws (detached mid-read) is dropped.
 */
export async function visibleCandidates<E>(probe: ProbeSpec, context: PageContext<E>): Promise<E[]> {
  const matches = await context.queryAll(probe).catch((): E[] => []);
  const ordered = probe.pick === "last" ? [...matches].reverse() : matches;
  if (probe.state === "attached") {
    return ordered;
  }

  const visible: E[] = [];
  for (const candidate of ordered) {
    if (await context.isVisible(candidate).catch(() => false)) {
      visible.push(candidate);
    }
  }
  return visible;
}

/**
 * First visible candidate of the first probe that has one. Later probes are
 * never queried once an earlier one matched.
 */
export async function resolveProbeChain<E>(chain: ProbeChain, context: PageContext<E>): Promise<E | undefined> {
  for (const probe of chain.probes) {
    const [first] = await visibleCandidates(probe, context);
    if (first !== undefined) {
      return first;
    }
  }
  return undefined;
}

export interface ResolvedProbeMatches<E> {
  probe: ProbeSpec;
  elements: E[];
}

/**
 * All visible candidates of the winning probe; used for list reads.
 */
export async function resolveAll<E>(
  chain: ProbeChain,
  context: PageContext<E>
): Promise<ResolvedProbeMatches<E> | undefined> {
  for (const probe of chain.probes) {
    const elements = await visibleCandidates(probe, context);
    if (elements.length > 0) {
      return { probe, elements };
    }
  }
  return undefined;
}

export async function requireProbe<E>(chain: ProbeChain, context: PageContext<E>): Promise<E> {
  const element = await resolveProbeChain(chain, context);
  if (element === undefined) {
    throw new ProbeNotFoundError(chain.name, chain.probes.map((probe) => probe.label));
  }
  return element;
}

export async function anyVisible<E>(chain: ProbeChain, context: PageContext<E>): Promise<boolean> {
  return (await resolveProbeChain(chain, context)) !== undefined;
}

/**
 * Fills `{name}` placeholders. A placeholder written right after a double quote
 * sits in quoted selector text, so its value gets quotes and backslashes
 * escaped; everywhere else values go in verbatim.
 */
export function bindProbeChain(chain: ProbeChain, values: Record<string, string>): ProbeChain {
  const substitute = (template: string, escapeQuoted: boolean): string =>
    template.replace(/(")?\{(\w+)\}/g, (placeholder, quote: string | undefined, key: string) => {
      const value = values[key];
      if (value === undefined) {
        return placeholder;
      }
      if (quote === undefined) {
        return value;
      }
      return quote + (escapeQuoted ? escapeQuotedSelectorText(value) : value);
    });

  return {
    name: chain.name,
    probes: chain.probes.map((probe) => {
      const bound: ProbeSpec = {
        ...probe,
        label: substitute(probe.label, false),
        selector: substitute(probe.selector, true)
      };
      if (probe.hasText !== undefined) {
        bound.hasText = substitute(probe.hasText, false);
      }
      return bound;
    })
  };
}

export function escapeQuotedSelectorText(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}
