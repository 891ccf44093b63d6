import { existsSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { EngineType, LogLevelName } from "./types.js";

export const DEFAULT_APP_URL = "https://notebooklm.google.com";

const DEFAULT_OPTIONS = {
  lock: {
    timeoutMs: 30_000,
    pollIntervalMs: 2_000,
    staleMs: 10_000
  },
  generation: {
    cadenceMs: 1_000,
    maxWaitMs: 480_000,
    lowStableTicks: 3,
    highStableTicks: 5,
    minTextLength: 50,
    startWaitMs: 60_000,
    settleMs: 3_000,
    extendMs: 5_000
  },
  search: {
    fastTimeoutMs: 1_200_000,
    deepTimeoutMs: 1_800_000,
    pollIntervalMs: 1_000,
    settleMs: 2_000,
    maxResults: 20
  },
  browser: {
    viewportWidth: 1280,
    viewportHeight: 800,
    defaultTimeoutMs: 120_000,
    navigationSettleMs: 5_000,
    signInTimeoutMs: 600_000
  },
  audio: {
    pollIntervalMs: 5_000,
    maxWaitMs: 600_000
  }
} as const;

const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const lockSchema = z
  .object({
    timeoutMs: z.number().int().nonnegative().default(DEFAULT_OPTIONS.lock.timeoutMs),
    pollIntervalMs: z.number().int().positive().default(DEFAULT_OPTIONS.lock.pollIntervalMs),
    // proper-lockfile refuses anything below 2 s.
    staleMs: z.number().int().min(2_000).default(DEFAULT_OPTIONS.lock.staleMs)
  })
  .default({});

const generationSchema = z
  .object({
    cadenceMs: z.number().int().positive().default(DEFAULT_OPTIONS.generation.cadenceMs),
    maxWaitMs: z.number().int().positive().default(DEFAULT_OPTIONS.generation.maxWaitMs),
    lowStableTicks: z.number().int().positive().default(DEFAULT_OPTIONS.generation.lowStableTicks),
    highStableTicks: z.number().int().positive().default(DEFAULT_OPTIONS.generation.highStableTicks),
    minTextLength: z.number().int().nonnegative().default(DEFAULT_OPTIONS.generation.minTextLength),
    startWaitMs: z.number().int().nonnegative().default(DEFAULT_OPTIONS.generation.startWaitMs),
    settleMs: z.number().int().nonnegative().default(DEFAULT_OPTIONS.generation.settleMs),
    extendMs: z.number().int().nonnegative().default(DEFAULT_OPTIONS.generation.extendMs)
  })
  .default({})
  .refine((value) => value.highStableTicks >= value.lowStableTicks, {
    message: "highStableTicks must be greater than or equal to lowStableTicks"
  });

const searchSchema = z
  .object({
    fastTimeoutMs: z.number().int().positive().default(DEFAULT_OPTIONS.search.fastTimeoutMs),
    deepTimeoutMs: z.number().int().positive().default(DEFAULT_OPTIONS.search.deepTimeoutMs),
    pollIntervalMs: z.number().int().positive().default(DEFAULT_OPTIONS.search.pollIntervalMs),
    settleMs: z.number().int().nonnegative().default(DEFAULT_OPTIONS.search.settleMs),
    maxResults: z.number().int().positive().default(DEFAULT_OPTIONS.search.maxResults)
  })
  .default({});

const browserSchema = z
  .object({
    viewportWidth: z.number().int().positive().default(DEFAULT_OPTIONS.browser.viewportWidth),
    viewportHeight: z.number().int().positive().default(DEFAULT_OPTIONS.browser.viewportHeight),
    defaultTimeoutMs: z.number().int().positive().default(DEFAULT_OPTIONS.browser.defaultTimeoutMs),
    navigationSettleMs: z.number().int().nonnegative().default(DEFAULT_OPTIONS.browser.navigationSettleMs),
    signInTimeoutMs: z.number().int().positive().default(DEFAULT_OPTIONS.browser.signInTimeoutMs)
  })
  .default({});

const audioSchema = z
  .object({
    pollIntervalMs: z.number().int().positive().default(DEFAULT_OPTIONS.audio.pollIntervalMs),
    maxWaitMs: z.number().int().positive().default(DEFAULT_OPTIONS.audio.maxWaitMs)
  })
  .default({});

export const configInputSchema = z.object({
  appUrl: z.string().url().optional(),
  homeDir: z.string().min(1).optional(),
  lockFilePath: z.string().min(1).optional(),
  probeCatalogPath: z.string().min(1).optional(),
  chromePath: z.string().min(1).optional(),
  logLevel: logLevelSchema.optional(),
  lock: lockSchema,
  generation: generationSchema,
  search: searchSchema,
  browser: browserSchema,
  audio: audioSchema
});

export type ConfigInput = z.input<typeof configInputSchema>;
type ParsedConfigInput = z.output<typeof configInputSchema>;

export interface NbpilotConfig {
  appUrl: string;
  homeDir: string;
  lockFilePath: string;
  instancesRoot: string;
  templateProfiles: Record<EngineType, string>;
  probeCatalogPath: string;
  chromePath?: string;
  logLevel: LogLevelName;
  lock: ParsedConfigInput["lock"];
  generation: ParsedConfigInput["generation"];
  search: ParsedConfigInput["search"];
  browser: ParsedConfigInput["browser"];
  audio: ParsedConfigInput["audio"];
}

export interface ResolveConfigContext {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  exists?: (path: string) => boolean;
}

/**
 * Builds the single configuration value for a run. Precedence: explicit input,
 * then environment, then defaults.
 */
export function resolveConfig(input: ConfigInput = {}, context: ResolveConfigContext = {}): NbpilotConfig {
  const env = context.env ?? process.env;
  const exists = context.exists ?? existsSync;

  const parsed = configInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, parsed.error);
  }
  const options = parsed.data;

  const envLogLevel = readEnv(env, "NBPILOT_LOG_LEVEL");
  let logLevel: LogLevelName = options.logLevel ?? "info";
  if (!options.logLevel && envLogLevel) {
    logLevel = parseLogLevel(envLogLevel, "NBPILOT_LOG_LEVEL");
  }

  const appUrl = options.appUrl ?? readEnv(env, "NBPILOT_APP_URL") ?? DEFAULT_APP_URL;
  if (!z.string().url().safeParse(appUrl).success) {
    throw new ConfigError(`Unsupported application URL '${appUrl}'`);
  }

  const homeDir = resolve(options.homeDir ?? readEnv(env, "NBPILOT_HOME") ?? join(homedir(), ".nbpilot"));
  const lockFilePath = resolve(
    options.lockFilePath ?? readEnv(env, "NBPILOT_LOCK_FILE") ?? join(tmpdir(), "nbpilot_global.lock")
  );

  return {
    appUrl,
    homeDir,
    lockFilePath,
    instancesRoot: join(homeDir, "profiles"),
    templateProfiles: {
      chromium: join(homeDir, "chrome_profile"),
      webkit: join(homeDir, "webkit_profile"),
      firefox: join(homeDir, "firefox_profile")
    },
    probeCatalogPath: resolve(options.probeCatalogPath ?? defaultProbeCatalogPath(exists)),
    chromePath:
      options.chromePath ??
      readEnv(env, "NBPILOT_CHROME_PATH") ??
      detectChromePath(context.platform ?? process.platform, exists),
    logLevel,
    lock: options.lock,
    generation: options.generation,
    search: options.search,
    browser: options.browser,
    audio: options.audio
  };
}

/**
 * First installed Chrome for the platform, or undefined to let the engine pick
 * its own channel.
 */
export function detectChromePath(
  platform: NodeJS.Platform,
  exists: (path: string) => boolean = existsSync
): string | undefined {
  const home = homedir();
  const candidates =
    platform === "darwin"
      ? [
          "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
          join(home, "Applications/Google Chrome.app/Contents/MacOS/Google Chrome")
        ]
      : platform === "win32"
        ? [
            join(home, "AppData/Local/Google/Chrome/Application/chrome.exe"),
            "C:/Program Files/Google/Chrome/Application/chrome.exe",
            "C:/Program Files (x86)/Google/Chrome/Application/chrome.exe"
          ]
        : [
            "/usr/bin/google-chrome",
            "/usr/bin/google-chrome-stable",
            "/usr/bin/chromium",
            "/usr/bin/chromium-browser",
            "/snap/bin/chromium"
          ];

  return candidates.find((candidate) => exists(candidate));
}

export function defaultProbeCatalogPath(exists: (path: string) => boolean = existsSync): string {
  let current = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth += 1) {
    const candidate = join(current, "probes", "notebook-ui.json");
    if (exists(candidate)) {
      return candidate;
    }
    current = dirname(current);
  }
  return resolve("probes", "notebook-ui.json");
}

export function parseLogLevel(raw: string, source = "log level"): LogLevelName {
  const level = logLevelSchema.safeParse(raw.trim().toLowerCase());
  if (!level.success) {
    throw new ConfigError(`Unsupported ${source} '${raw}'. Use debug|info|warn|error|silent.`);
  }
  return level.data;
}

export function searchTimeoutFor(config: NbpilotConfig, mode: "fast" | "deep"): number {
  return mode === "deep" ? config.search.deepTimeoutMs : config.search.fastTimeoutMs;
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value && value.length > 0 ? value : undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
