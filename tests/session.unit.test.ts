import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type NbpilotConfig, resolveConfig } from "../src/config.js";
import { LockTimeoutError } from "../src/errors.js";
import { LockManager } from "../src/lock.js";
import { silentLogger } from "../src/logger.js";
import { SessionOrchestrator } from "../src/session.js";
import type { DriverLaunchOptions } from "../src/types.js";
import { type FakeElement, FakePage, testCatalog } from "./helpers/fakePage.js";

class FailingClosePage extends FakePage {
  override async close(): Promise<void> {
    throw new Error("browser already gone");
  }
}

describe("SessionOrchestrator", () => {
  let home: string;
  let config: NbpilotConfig;
  let launches: DriverLaunchOptions[];
  let pages: FakePage[];

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "nbpilot-session-"));
    config = resolveConfig(
      { homeDir: home, lockFilePath: join(home, "global.lock") },
      { env: {}, exists: () => false }
    );
    launches = [];
    pages = [];
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  function orchestrator(makePage: () => FakePage = () => new FakePage()): SessionOrchestrator<FakeElement> {
    return new SessionOrchestrator<FakeElement>({
      config,
      catalog: testCatalog(),
      logger: silentLogger(),
      driverFactory: async (options) => {
        launches.push(options);
        const page = makePage();
        pages.push(page);
        return page;
      }
    });
  }

  it("runs the operation in the notebook's own profile and tears down", async () => {
    const result = await orchestrator().runSession({ notebook: "01. Research Notes" }, async (context) => {
      expect(existsSync(config.lockFilePath)).toBe(true);
      expect(context.lock.released).toBe(false);
      return { instanceKey: context.instanceKey, profilePath: context.profilePath };
    });

    const profilePath = join(home, "profiles", "nb_01", "chromium");
    expect(result).toEqual({ instanceKey: "nb_01", profilePath });
    expect(existsSync(profilePath)).toBe(true);
    expect(launches[0]).toMatchObject({ engine: "chromium", headless: false, userDataDir: profilePath });
    expect(pages[0]?.closed).toBe(true);
    expect(existsSync(config.lockFilePath)).toBe(false);
  });

  it("gives differently named notebooks separate profiles", async () => {
    const sessions = orchestrator();
    const first = await sessions.runSession({ notebook: "01. Research Notes" }, async (context) => context.profilePath);
    const second = await sessions.runSession({ notebook: "Untitled Project" }, async (context) => context.profilePath);

    expect(first).toBe(join(home, "profiles", "nb_01", "chromium"));
    expect(second).toBe(join(home, "profiles", "nb_328776f6", "chromium"));
  });

  it("uses the shared profile without an instance", async () => {
    const profilePath = await orchestrator().runSession(
      { notebook: "01. Research Notes", autoInstance: false, engine: "firefox" },
      async (context) => context.profilePath
    );

    expect(profilePath).toBe(join(home, "firefox_profile"));
  });

  it("releases the lock and closes the browser when the operation fails", async () => {
    await expect(
      orchestrator().runSession({ notebook: "Untitled Project" }, async () => {
        throw new Error("workflow failed");
      })
    ).rejects.toThrow("workflow failed");

    expect(pages[0]?.closed).toBe(true);
    expect(existsSync(config.lockFilePath)).toBe(false);
  });

  it("releases the lock when the browser cannot start", async () => {
    const sessions = new SessionOrchestrator<FakeElement>({
      config,
      catalog: testCatalog(),
      logger: silentLogger(),
      driverFactory: async () => {
        throw new Error("no browser");
      }
    });

    await expect(sessions.runSession({}, async () => "unreachable")).rejects.toThrow("no browser");
    expect(existsSync(config.lockFilePath)).toBe(false);
  });

  it("does not fail on a browser that will not close", async () => {
    await expect(
      orchestrator(() => new FailingClosePage()).runSession({}, async () => "done")
    ).resolves.toBe("done");
    expect(existsSync(config.lockFilePath)).toBe(false);
  });

  it("fails fast without launching when another session holds the lock", async () => {
    const other = new LockManager({ lockPath: config.lockFilePath, timeoutMs: 1_000, pollIntervalMs: 10 });
    const held = await other.acquire();

    await expect(
      orchestrator().runSession({ notebook: "01. Research Notes", lockTimeoutMs: 30 }, async () => "unreachable")
    ).rejects.toBeInstanceOf(LockTimeoutError);

    expect(launches).toEqual([]);
    expect(existsSync(join(home, "profiles"))).toBe(false);
    await other.release(held);
  });

  it("clears singleton markers left in the profile", async () => {
    const profilePath = join(home, "profiles", "nb_01", "chromium");
    await mkdir(profilePath, { recursive: true });
    await writeFile(join(profilePath, "SingletonLock"), "", "utf8");
    await writeFile(join(profilePath, "Preferences"), "{}", "utf8");

    await orchestrator().runSession({ notebook: "01. Research Notes" }, async () => undefined);

    expect(existsSync(join(profilePath, "SingletonLock"))).toBe(false);
    expect(existsSync(join(profilePath, "Preferences"))).toBe(true);
  });

  it("attaches over CDP without touching profiles", async () => {
    const profilePath = await orchestrator().runSession(
      { notebook: "01. Research Notes", cdpUrl: "http://127.0.0.1:9222" },
      async (context) => context.profilePath
    );

    expect(profilePath).toBeUndefined();
    expect(launches[0]).toMatchObject({ cdpUrl: "http://127.0.0.1:9222", userDataDir: undefined });
    expect(existsSync(join(home, "profiles"))).toBe(false);
  });

  it("does nothing once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("interrupted"));

    await expect(
      orchestrator().runSession({ signal: controller.signal }, async () => "unreachable")
    ).rejects.toThrow("interrupted");
    expect(launches).toEqual([]);
    expect(existsSync(config.lockFilePath)).toBe(false);
  });
});
