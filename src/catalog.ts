import { readFile } from "node:fs/promises";
import { ZodError } from "zod";
import { type NoiseLists, type ParsedProbeCatalog, type ProbeChainName, parseProbeCatalog } from "./contracts.js";
import { ConfigError } from "./errors.js";
import { bindProbeChain } from "./probe.js";
import type { ProbeChain, ProbeSpec } from "./types.js";

/**
 * The site vocabulary: every selector and text heuristic, keyed by what it
 * locates.
 */
export class ProbeCatalog {
  private readonly chains = new Map<string, ProbeChain>();

  constructor(parsed: ParsedProbeCatalog) {
    for (const [name, probes] of Object.entries(parsed.chains)) {
      this.chains.set(name, {
        name,
        probes: probes.map(
          (probe): ProbeSpec => ({
            ...probe,
            label: probe.label ?? defaultLabel(probe.selector, probe.hasText)
          })
        )
      });
    }
    this.noise = parsed.noise;
  }

  readonly noise: NoiseLists;

  chain(name: ProbeChainName): ProbeChain {
    const chain = this.chains.get(name);
    if (!chain) {
      throw new ConfigError(`Probe catalog has no chain '${name}'`);
    }
    return chain;
  }

  bound(name: ProbeChainName, values: Record<string, string>): ProbeChain {
    return bindProbeChain(this.chain(name), values);
  }

  static fromJson(raw: unknown): ProbeCatalog {
    try {
      return new ProbeCatalog(parseProbeCatalog(raw));
    } catch (error) {
      if (error instanceof ZodError) {
        const detail = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new ConfigError(`Invalid probe catalog: ${detail}`, error);
      }
      throw error;
    }
  }
}

export async function loadProbeCatalog(path: string): Promise<ProbeCatalog> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read probe catalog ${path}`, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Probe catalog ${path} is not valid JSON`, error);
  }
  return ProbeCatalog.fromJson(parsed);
}

function defaultLabel(selector: string, hasText: string | undefined): string {
  return hasText ? `${selector} hasText(${hasText})` : selector;
}
