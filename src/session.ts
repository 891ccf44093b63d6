import type { ProbeCatalog } from "./catalog.js";
import type { NbpilotConfig } from "./config.js";
import { describeError } from "./errors.js";
import { selectInstance } from "./instance.js";
import { LockManager } from "./lock.js";
import type { NbLogger } from "./logger.js";
import { ProfileStore } from "./profile-store.js";
import type { DriverFactory, EngineType, LockHandle, PageDriver } from "./types.js";

export interface SessionRequest {
  /** Target notebook; drives the automatic instance key. */
  notebook?: string;
  instance?: string;
  autoInstance?: boolean;
  engine?: EngineType;
  headless?: boolean;
  cdpUrl?: string;
  lockTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface SessionContext<E> {
  config: NbpilotConfig;
  catalog: ProbeCatalog;
  driver: PageDriver<E>;
  logger: NbLogger;
  instanceKey?: string;
  profilePath?: string;
  lock: LockHandle;
  signal?: AbortSignal;
}

export type SessionOperation<E, T> = (context: SessionContext<E>) => Promise<T>;

export interface SessionOrchestratorOptions<E> {
  config: NbpilotConfig;
  catalog: ProbeCatalog;
  driverFactory: DriverFactory<E>;
  logger: NbLogger;
  lockManager?: LockManager;
  profileStore?: ProfileStore;
}

/**
 * Runs one operation inside an exclusive, isolated browser session: instance
 * selection, host lock, profile, driver, operation, then teardown in reverse on
 * every exit path.
 */
export class SessionOrchestrator<E> {
  private readonly lockManager: LockManager;
  private readonly profileStore: ProfileStore;

  constructor(private readonly options: SessionOrchestratorOptions<E>) {
    const { config, logger } = options;
    this.lockManager =
      options.lockManager ??
      new LockManager({
        lockPath: config.lockFilePath,
        timeoutMs: config.lock.timeoutMs,
        pollIntervalMs: config.lock.pollIntervalMs,
        staleMs: config.lock.staleMs,
        logger: logger.getSubLogger({ name: "lock" })
      });
    this.profileStore =
      options.profileStore ??
      new ProfileStore({
        instancesRoot: config.instancesRoot,
        templateProfiles: config.templateProfiles,
        logger: logger.getSubLogger({ name: "profile" })
      });
  }

  async runSession<T>(request: SessionRequest, operation: SessionOperation<E, T>): Promise<T> {
    const { config, logger } = this.options;
    request.signal?.throwIfAborted();

    const engine = request.engine ?? "chromium";
    const instanceKey = selectInstance({
      instance: request.instance,
      autoInstance: request.autoInstance,
      notebook: request.notebook
    });

    // The lock comes first so two processes never bootstrap the same profile.
    const lock = await this.lockManager.acquire(request.lockTimeoutMs ?? config.lock.timeoutMs, request.signal);
    let driver: PageDriver<E> | undefined;

    try {
      let profilePath: string | undefined;
      if (request.cdpUrl) {
        logger.info(`Attaching to running browser at ${request.cdpUrl}`);
      } else {
        profilePath = instanceKey
          ? await this.profileStore.ensure(instanceKey, engine)
          : await this.profileStore.sharedProfile(engine);
        await this.profileStore.clearSingletonArtifacts(profilePath);
        logger.info(describeProfile(instanceKey, request, profilePath));
      }

      driver = await this.options.driverFactory({
        engine,
        headless: request.headless ?? false,
        userDataDir: profilePath,
        cdpUrl: request.cdpUrl,
        executablePath: engine === "chromium" ? config.chromePath : undefined,
        viewportWidth: config.browser.viewportWidth,
        viewportHeight: config.browser.viewportHeight,
        defaultTimeoutMs: config.browser.defaultTimeoutMs
      });

      return await operation({
        config,
        catalog: this.options.catalog,
        driver,
        logger: logger.getSubLogger({ name: "workflow" }),
        instanceKey,
        profilePath,
        lock,
        signal: request.signal
      });
    } finally {
      if (driver) {
        await driver.close().catch((error: unknown) => {
          logger.warn(`Browser did not close cleanly: ${describeError(error)}`);
        });
      }
      await this.lockManager.release(lock);
    }
  }
}

function describeProfile(instanceKey: string | undefined, request: SessionRequest, profilePath: string): string {
  if (!instanceKey) {
    return `Shared profile ${profilePath}`;
  }
  const automatic = request.instance === undefined && request.notebook !== undefined;
  const origin = automatic ? ` (notebook: ${request.notebook?.slice(0, 30)})` : "";
  return `Instance ${instanceKey}${origin}, profile ${profilePath}`;
}
