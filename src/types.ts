export type EngineType = "chromium" | "webkit" | "firefox";

export type SearchState = "READY" | "PENDING_RESULTS" | "UNKNOWN";

export type UiMode = "chat" | "source_search" | "unknown";

export type ResearchMode = "fast" | "deep";

export type SourceType = "web" | "drive" | "youtube" | "link";

export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

export interface ProbeSpec {
  label: string;
  selector: string;
  hasText?: string;
  pick?: "first" | "last";
  state?: "visible" | "attached";
}

export interface ProbeChain {
  name: string;
  probes: ProbeSpec[];
}

export interface ClickOptions {
  force?: boolean;
  button?: "left" | "right";
}

/**
 * The minimal read surface the probe chain evaluator needs. Elements are opaque
 * to everything above the driver.
 */
export interface PageContext<E> {
  queryAll(probe: ProbeSpec): Promise<E[]>;
  isVisible(element: E): Promise<boolean>;
}

export interface PageDriver<E> extends PageContext<E> {
  navigate(url: string): Promise<void>;
  probe(chain: ProbeChain): Promise<E | undefined>;
  click(element: E, options?: ClickOptions): Promise<void>;
  fill(element: E, text: string): Promise<void>;
  /** Presses on the element, or on the page keyboard when `target` is null. */
  pressKey(target: E | null, key: string): Promise<void>;
  readText(element: E): Promise<string>;
  readAttribute(element: E, name: string): Promise<string | null>;
  screenshot(path: string): Promise<void>;
  wait(ms: number, signal?: AbortSignal): Promise<void>;
  currentUrl(): string;
  pageText(): Promise<string>;
  setInputFiles(element: E, paths: string[]): Promise<void>;
  saveDownload(element: E, path: string): Promise<void>;
  close(): Promise<void>;
}

export interface DriverLaunchOptions {
  engine: EngineType;
  headless: boolean;
  userDataDir?: string;
  cdpUrl?: string;
  executablePath?: string;
  viewportWidth: number;
  viewportHeight: number;
  defaultTimeoutMs: number;
}

export type DriverFactory<E> = (options: DriverLaunchOptions) => Promise<PageDriver<E>>;

export interface LockHandle {
  lockPath: string;
  token: string;
  pid: number;
  acquiredAt: number;
  timeoutMs: number;
  released: boolean;
}

export interface GenerationSession {
  lastText: string;
  stableCount: number;
  elapsedMs: number;
  ticks: number;
  sawInProgress: boolean;
}

export interface GenerationObservation {
  inProgress: boolean;
  loading: boolean;
  text: string;
}

export interface GenerationOutcome {
  status: "complete" | "timed_out";
  text: string;
  elapsedMs: number;
  ticks: number;
  stableCount: number;
  sawInProgress: boolean;
}

export type SearchCompletionSignal = "pending_results" | "completion_banner" | "result_titles";

export interface SearchOutcome {
  status: "complete" | "timed_out";
  elapsedMs: number;
  signal?: SearchCompletionSignal;
  results: string[];
}

export interface SearchResultEntry {
  title: string;
  sourceType: string;
  canImport: boolean;
  canRemove: boolean;
}

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

export interface SourceDetails {
  title: string;
  type: string;
  preview: string;
  url: string;
}
