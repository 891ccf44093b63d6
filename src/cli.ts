#!/usr/bin/env node

import { join } from "node:path";
import process from "node:process";
import { Command } from "commander";
import type { Locator } from "playwright-core";
import { ensureSignedIn } from "./auth.js";
import { loadProbeCatalog } from "./catalog.js";
import { chat, chatHistory, detectMode, saveNote, smartChat } from "./chat.js";
import { parseLogLevel, resolveConfig } from "./config.js";
import { launchPlaywrightDriver } from "./driver.js";
import { ConfigError, LockTimeoutError, describeError } from "./errors.js";
import { selectInstance } from "./instance.js";
import { createLogger } from "./logger.js";
import {
  createNotebook,
  deleteNotebook,
  generateAudio,
  listNotebooks,
  openNotebook,
  uploadDocument
} from "./notebooks.js";
import {
  clearSearch,
  detectSearchState,
  importSearchResult,
  removeSearchResult,
  searchSources,
  viewSearchResults
} from "./search.js";
import { type SessionOperation, SessionOrchestrator } from "./session.js";
import { deleteSource, inspectSource, listSources } from "./sources.js";
import type { ChatMessage, EngineType, GenerationOutcome, ResearchMode, SearchOutcome, SourceType } from "./types.js";

// commander's opts() needs an index-signature-compatible shape, hence a type alias.
type GlobalOptions = {
  headless: boolean;
  browser: string;
  instance?: string;
  autoInstance: boolean;
  cdpUrl?: string;
  timeout?: string;
  lockTimeout?: string;
  logLevel?: string;
};

interface CliRuntime {
  orchestrator: SessionOrchestrator<Locator>;
  engine: EngineType;
}

interface SearchCommandOptions {
  mode: string;
  sourceType: string;
  autoClear: boolean;
}

const ENGINES = ["chromium", "webkit", "firefox"] as const;
const RESEARCH_MODES = ["fast", "deep"] as const;
const SOURCE_TYPES = ["web", "drive", "youtube", "link"] as const;
const HISTORY_FORMATS = ["text", "json"] as const;

const abortController = new AbortController();
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    console.error(`\nReceived ${signal}; closing the browser and releasing the lock...`);
    abortController.abort(new Error(`Interrupted by ${signal}`));
  });
}

const program = new Command();
program
  .name("nbpilot")
  .description("Drive NotebookLM notebooks from the command line, one browser session at a time")
  .version("0.1.0")
  .option("--headless", "Run the browser headless", false)
  .option("--browser <engine>", "Browser engine: chromium|webkit|firefox", "chromium")
  .option("--instance <name>", "Use this browser instance instead of the notebook-derived one")
  .option("--no-auto-instance", "Use the shared profile instead of one instance per notebook")
  .option("--cdp-url <url>", "Attach to a running Chrome over CDP instead of launching one")
  .option("--timeout <seconds>", "Budget for chat answers and source searches")
  .option("--lock-timeout <seconds>", "How long to wait for another session to finish")
  .option("--log-level <level>", "debug|info|warn|error|silent");

configureAccountCommands(program);
configureNotebookCommands(program);
configureChatCommands(program);
configureSourceCommands(program);
configureSearchCommands(program);
configureInstanceCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exitCode = error instanceof LockTimeoutError ? 2 : 1;
});

function configureAccountCommands(root: Command): void {
  root
    .command("login")
    .description("Open the app and wait until the account is signed in")
    .action(async () => {
      const signedIn = await runWorkflow(undefined, (context) => ensureSignedIn(context));
      console.log(signedIn ? "Signed in." : "Sign-in did not complete.");
      if (!signedIn) {
        process.exitCode = 1;
      }
    });
}

function configureNotebookCommands(root: Command): void {
  root
    .command("list")
    .description("List notebooks on the home page")
    .action(async () => {
      const titles = await runWorkflow(undefined, (context) => listNotebooks(context));
      if (titles.length === 0) {
        console.log("No notebooks found.");
        return;
      }
      titles.forEach((title, index) => console.log(`${index + 1}. ${title}`));
    });

  root
    .command("create")
    .description("Create a notebook")
    .argument("<name>", "Notebook name")
    .action(async (name: string) => {
      await runWorkflow(name, (context) => createNotebook(context, name));
      console.log(`Created notebook: ${name}`);
    });

  root
    .command("delete")
    .description("Delete a notebook")
    .argument("<name>", "Notebook name")
    .action(async (name: string) => {
      await runWorkflow(name, (context) => deleteNotebook(context, name));
      console.log(`Deleted notebook: ${name}`);
    });

  root
    .command("upload")
    .description("Upload a document as a notebook source")
    .argument("<file>", "File to upload")
    .option("--notebook <name>", "Target notebook; created when it does not exist")
    .action(async (file: string, options: { notebook?: string }) => {
      const uploaded = await runWorkflow(options.notebook, (context) =>
        uploadDocument(context, file, options.notebook)
      );
      console.log(`Uploaded: ${uploaded}`);
    });

  root
    .command("audio")
    .description("Generate the audio overview and optionally download it")
    .argument("<notebook>", "Notebook name")
    .option("--output <path>", "Save the audio file here")
    .action(async (notebook: string, options: { output?: string }) => {
      const result = await runWorkflow(notebook, (context) => generateAudio(context, notebook, options.output));
      if (!result.ready) {
        console.log(`Audio not ready after ${Math.round(result.elapsedMs / 1000)}s.`);
        process.exitCode = 1;
        return;
      }
      console.log(result.savedTo ? `Audio saved: ${result.savedTo}` : "Audio download started.");
    });
}

function configureChatCommands(root: Command): void {
  root
    .command("chat")
    .description("Ask a question and print the answer")
    .argument("<notebook>", "Notebook name")
    .argument("<question>", "Question to ask")
    .action(async (notebook: string, question: string) => {
      const timeoutSeconds = toOptionalNumber(globalOptions().timeout);
      const outcome = await runWorkflow(notebook, (context) =>
        timeoutSeconds === undefined
          ? chat(context, notebook, question)
          : smartChat(context, notebook, question, { maxWaitMs: timeoutSeconds * 1000 })
      );
      printAnswer(outcome);
    });

  root
    .command("smart-chat")
    .description("Ask a question, clearing an open source search first")
    .argument("<notebook>", "Notebook name")
    .argument("<question>", "Question to ask")
    .option("--max-wait <seconds>", "Budget for the answer")
    .option("--save-note", "Save the answer as a note", false)
    .action(async (notebook: string, question: string, options: { maxWait?: string; saveNote: boolean }) => {
      const maxWaitSeconds = toOptionalNumber(options.maxWait) ?? toOptionalNumber(globalOptions().timeout);
      const outcome = await runWorkflow(notebook, async (context) => {
        const answer = await smartChat(context, notebook, question, {
          maxWaitMs: maxWaitSeconds === undefined ? undefined : maxWaitSeconds * 1000
        });
        if (options.saveNote && answer.text) {
          await saveNote(context, notebook, answer.text, `Q&A: ${truncate(question, 30)}`);
        }
        return answer;
      });
      printAnswer(outcome);
    });

  root
    .command("save-note")
    .description("Save text as a note")
    .argument("<notebook>", "Notebook name")
    .argument("<content>", "Note body")
    .option("--title <title>", "Note title")
    .action(async (notebook: string, content: string, options: { title?: string }) => {
      await runWorkflow(notebook, (context) => saveNote(context, notebook, content, options.title));
      console.log("Note saved.");
    });

  root
    .command("chat-history")
    .description("Print the conversation of a notebook")
    .argument("<notebook>", "Notebook name")
    .option("--limit <n>", "Maximum number of messages", "20")
    .option("--format <format>", "Output format: text|json", "text")
    .action(async (notebook: string, options: { limit: string; format: string }) => {
      const format = oneOf(options.format, HISTORY_FORMATS, "format");
      const limit = Math.max(1, toNumber(options.limit, 20));
      const messages = await runWorkflow(notebook, (context) => chatHistory(context, notebook, limit));
      printHistory(messages, format);
    });

  root
    .command("detect-mode")
    .description("Report whether the notebook shows chat or source search")
    .argument("<notebook>", "Notebook name")
    .action(async (notebook: string) => {
      const mode = await runWorkflow(notebook, async (context) => {
        await openNotebook(context, notebook);
        return detectMode(context);
      });
      console.log(mode);
    });
}

function configureSourceCommands(root: Command): void {
  root
    .command("sources")
    .description("List the sources of a notebook")
    .argument("<notebook>", "Notebook name")
    .action(async (notebook: string) => {
      const names = await runWorkflow(notebook, (context) => listSources(context, notebook));
      if (names.length === 0) {
        console.log("No sources found.");
        return;
      }
      names.forEach((name, index) => console.log(`${index + 1}. ${name}`));
    });

  root
    .command("delete-source")
    .description("Delete a source")
    .argument("<notebook>", "Notebook name")
    .argument("<source>", "Source title")
    .action(async (notebook: string, source: string) => {
      const deleted = await runWorkflow(notebook, (context) => deleteSource(context, notebook, source));
      reportFlag(deleted, `Deleted source: ${source}`, `Could not delete source: ${source}`);
    });

  root
    .command("inspect-source")
    .description("Show type, preview and link of a source")
    .argument("<notebook>", "Notebook name")
    .argument("<source>", "Source title")
    .action(async (notebook: string, source: string) => {
      const details = await runWorkflow(notebook, (context) => inspectSource(context, notebook, source));
      console.log(`Title: ${details.title}`);
      console.log(`Type: ${details.type || "-"}`);
      console.log(`URL: ${details.url || "-"}`);
      if (details.preview) {
        console.log("");
        console.log(details.preview);
      }
    });
}

function configureSearchCommands(root: Command): void {
  root
    .command("search-sources")
    .description("Search the web or Drive for new sources; results stay pending until handled")
    .argument("<notebook>", "Notebook name")
    .argument("<query>", "Search query")
    .option("--mode <mode>", "Research mode: fast|deep", "fast")
    .option("--source-type <type>", "Source type: web|drive|youtube|link", "web")
    .option("--no-auto-clear", "Fail instead of discarding results left from an earlier search")
    .action(async (notebook: string, query: string, options: SearchCommandOptions) => {
      const mode: ResearchMode = oneOf(options.mode, RESEARCH_MODES, "mode");
      const sourceType: SourceType = oneOf(options.sourceType, SOURCE_TYPES, "source type");
      const timeoutSeconds = toOptionalNumber(globalOptions().timeout);
      const outcome = await runWorkflow(notebook, (context) =>
        searchSources(context, notebook, query, {
          mode,
          sourceType,
          autoClear: options.autoClear,
          timeoutMs: timeoutSeconds === undefined ? undefined : timeoutSeconds * 1000
        })
      );
      printSearchOutcome(outcome);
    });

  root
    .command("view-results")
    .description("Open the pending search results and list them")
    .argument("<notebook>", "Notebook name")
    .action(async (notebook: string) => {
      const view = await runWorkflow(notebook, (context) => viewSearchResults(context, notebook));
      if (!view.opened) {
        console.log("No pending search results.");
        process.exitCode = 1;
        return;
      }
      view.entries.forEach((entry, index) => {
        const type = entry.sourceType ? ` [${entry.sourceType}]` : "";
        const importable = entry.canImport ? "" : " (import unavailable)";
        console.log(`${index + 1}. ${entry.title}${type}${importable}`);
      });
    });

  root
    .command("import-result")
    .description("Import one pending search result as a source")
    .argument("<notebook>", "Notebook name")
    .argument("<title>", "Result title or its beginning")
    .action(async (notebook: string, title: string) => {
      const imported = await runWorkflow(notebook, (context) => importSearchResult(context, notebook, title));
      reportFlag(imported, `Imported: ${title}`, `Could not import: ${title}`);
    });

  root
    .command("remove-result")
    .description("Remove one pending search result")
    .argument("<notebook>", "Notebook name")
    .argument("<title>", "Result title or its beginning")
    .action(async (notebook: string, title: string) => {
      const removed = await runWorkflow(notebook, (context) => removeSearchResult(context, notebook, title));
      reportFlag(removed, `Removed: ${title}`, `Could not remove: ${title}`);
    });

  root
    .command("clear-search")
    .description("Discard pending search results")
    .argument("<notebook>", "Notebook name")
    .action(async (notebook: string) => {
      const cleared = await runWorkflow(notebook, (context) => clearSearch(context, notebook));
      reportFlag(cleared, "Search cleared.", "Search could not be cleared.");
    });

  root
    .command("detect-search-state")
    .description("Print READY, PENDING_RESULTS or UNKNOWN")
    .argument("<notebook>", "Notebook name")
    .action(async (notebook: string) => {
      console.log(await runWorkflow(notebook, (context) => detectSearchState(context, notebook)));
    });
}

function configureInstanceCommand(root: Command): void {
  root
    .command("resolve-instance")
    .description("Print the instance key and profile directory a notebook maps to")
    .argument("<notebook>", "Notebook name")
    .action((notebook: string) => {
      const options = globalOptions();
      const engine = oneOf(options.browser, ENGINES, "browser");
      const config = resolveConfig({ logLevel: options.logLevel ? parseLogLevel(options.logLevel) : undefined });
      const instanceKey = selectInstance({ instance: options.instance, autoInstance: options.autoInstance, notebook });
      if (!instanceKey) {
        console.log(`shared\t${config.templateProfiles[engine]}`);
        return;
      }
      console.log(`${instanceKey}\t${join(config.instancesRoot, instanceKey, engine)}`);
    });
}

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

async function createRuntime(): Promise<CliRuntime> {
  const options = globalOptions();
  const engine = oneOf(options.browser, ENGINES, "browser");
  const config = resolveConfig({ logLevel: options.logLevel ? parseLogLevel(options.logLevel) : undefined });
  const logger = createLogger(config.logLevel);
  const catalog = await loadProbeCatalog(config.probeCatalogPath);
  logger.debug(`Probe catalog: ${config.probeCatalogPath}`);

  const orchestrator = new SessionOrchestrator<Locator>({
    config,
    catalog,
    driverFactory: launchPlaywrightDriver,
    logger: logger.getSubLogger({ name: "session" })
  });
  return { orchestrator, engine };
}

async function runWorkflow<T>(notebook: string | undefined, operation: SessionOperation<Locator, T>): Promise<T> {
  const options = globalOptions();
  const runtime = await createRuntime();
  const lockTimeoutSeconds = toOptionalNumber(options.lockTimeout);

  return runtime.orchestrator.runSession(
    {
      notebook,
      instance: options.instance,
      autoInstance: options.autoInstance,
      engine: runtime.engine,
      headless: options.headless,
      cdpUrl: options.cdpUrl,
      lockTimeoutMs: lockTimeoutSeconds === undefined ? undefined : lockTimeoutSeconds * 1000,
      signal: abortController.signal
    },
    operation
  );
}

function printAnswer(outcome: GenerationOutcome): void {
  if (!outcome.text) {
    console.log("No answer received.");
    process.exitCode = 1;
    return;
  }
  if (outcome.status === "timed_out") {
    console.error(`Answer may be incomplete (stopped after ${Math.round(outcome.elapsedMs / 1000)}s).`);
  }
  console.log(outcome.text);
}

function printSearchOutcome(outcome: SearchOutcome): void {
  const seconds = Math.round(outcome.elapsedMs / 1000);
  const evidence = outcome.signal ? `, ${outcome.signal}` : "";
  console.log(`Search ${outcome.status} after ${seconds}s${evidence}.`);
  if (outcome.results.length === 0) {
    console.log("No results read; try view-results.");
    return;
  }
  outcome.results.forEach((title, index) => console.log(`${index + 1}. ${truncate(title, 100)}`));
  console.log("Results stay pending: import-result, remove-result or clear-search.");
}

function printHistory(messages: ChatMessage[], format: "text" | "json"): void {
  if (format === "json") {
    console.log(JSON.stringify(messages, null, 2));
    return;
  }
  if (messages.length === 0) {
    console.log("No conversation found.");
    return;
  }
  for (const message of messages) {
    console.log(`[${message.role}] ${message.content}`);
    console.log("");
  }
}

function reportFlag(ok: boolean, success: string, failure: string): void {
  if (ok) {
    console.log(success);
    return;
  }
  console.log(failure);
  process.exitCode = 1;
}

function oneOf<T extends string>(raw: string, allowed: readonly T[], label: string): T {
  const match = allowed.find((value) => value === raw.trim().toLowerCase());
  if (match === undefined) {
    throw new ConfigError(`Unsupported ${label} '${raw}'. Use ${allowed.join("|")}.`);
  }
  return match;
}

function toNumber(raw: string | boolean | undefined, fallback: number): number {
  if (typeof raw !== "string") {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toOptionalNumber(raw: string | boolean | undefined): number | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function truncate(input: string, max = 60): string {
  if (input.length <= max) {
    return input;
  }
  return `${input.slice(0, max - 1)}...`;
}
