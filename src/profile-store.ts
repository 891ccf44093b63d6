import { cp, mkdir, readdir, rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { ProfileBootstrapError, describeError } from "./errors.js";
import type { NbLogger } from "./logger.js";
import type { EngineType } from "./types.js";

const SINGLETON_ARTIFACTS = ["SingletonLock", "SingletonSocket", "SingletonCookie"];

export interface ProfileStoreOptions {
  instancesRoot: string;
  templateProfiles: Record<EngineType, string>;
  logger?: NbLogger;
}

export interface ProfileBootstrapReport {
  profilePath: string;
  templatePath: string;
  copied: string[];
  skipped: string[];
}

export class ProfileStore {
  constructor(private readonly options: ProfileStoreOptions) {}

  profilePathFor(instanceKey: string, engine: EngineType): string {
    return join(this.options.instancesRoot, instanceKey, engine);
  }

  templatePathFor(engine: EngineType): string {
    return this.options.templateProfiles[engine];
  }

  async ensure(instanceKey: string, engine: EngineType): Promise<string> {
    const report = await this.bootstrap(instanceKey, engine);
    return report.profilePath;
  }

  /**
   * Creates the instance profile and, when it is absent or empty, fills it from
   * the template. Entries are copied into a staging sibling that is renamed into
   * place only after every copy succeeded, so a failed bootstrap leaves no
   * half-filled profile behind and the next call starts over.
   */
  async bootstrap(instanceKey: string, engine: EngineType): Promise<ProfileBootstrapReport> {
    const profilePath = this.profilePathFor(instanceKey, engine);
    const templatePath = this.templatePathFor(engine);
    const stagingPath = `${profilePath}.partial`;
    const report: ProfileBootstrapReport = { profilePath, templatePath, copied: [], skipped: [] };

    try {
      const existing = await listEntries(profilePath);
      if (existing && existing.length > 0) {
        return report;
      }

      const templateEntries = await listEntries(templatePath);
      if (!templateEntries || templateEntries.length === 0) {
        await mkdir(profilePath, { recursive: true });
        this.options.logger?.debug(`No template at ${templatePath}; ${instanceKey} starts with an empty profile`);
        return report;
      }

      await rm(stagingPath, { recursive: true, force: true });
      await mkdir(stagingPath, { recursive: true });
      for (const entry of templateEntries) {
        if (entry.startsWith("Singleton")) {
          report.skipped.push(entry);
          continue;
        }
        await cp(join(templatePath, entry), join(stagingPath, entry), {
          recursive: true,
          force: false,
          errorOnExist: false,
          preserveTimestamps: true
        });
        report.copied.push(entry);
      }

      if (existing) {
        await rm(profilePath, { recursive: true, force: true });
      }
      await rename(stagingPath, profilePath);
    } catch (error) {
      await rm(stagingPath, { recursive: true, force: true }).catch((cleanupError: unknown) => {
        this.options.logger?.warn(`Could not remove ${stagingPath}: ${describeError(cleanupError)}`);
      });
      throw new ProfileBootstrapError(profilePath, templatePath, error);
    }

    this.options.logger?.info(
      `Bootstrapped profile ${instanceKey}/${engine} from template (${report.copied.length} entries)`
    );
    return report;
  }

  /**
   * The template directory doubles as the shared profile when no instance
   * applies.
   */
  async sharedProfile(engine: EngineType): Promise<string> {
    const templatePath = this.templatePathFor(engine);
    try {
      await mkdir(templatePath, { recursive: true });
    } catch (error) {
      throw new ProfileBootstrapError(templatePath, templatePath, error);
    }
    return templatePath;
  }

  /**
   * Best effort: markers left by a session that did not shut down cleanly.
   */
  async clearSingletonArtifacts(profilePath: string): Promise<string[]> {
    const removed: string[] = [];
    const entries = await listEntries(profilePath).catch(() => undefined);
    const targets = new Set(SINGLETON_ARTIFACTS);
    for (const entry of entries ?? []) {
      if (entry.startsWith("Singleton")) {
        targets.add(entry);
      }
    }

    for (const target of targets) {
      try {
        await rm(join(profilePath, target), { force: true, recursive: true });
        if (entries?.includes(target)) {
          removed.push(target);
        }
      } catch (error) {
        this.options.logger?.debug(`Could not remove ${target}: ${describeError(error)}`);
      }
    }
    return removed;
  }
}

async function listEntries(path: string): Promise<string[] | undefined> {
  try {
    return (await readdir(path)).sort((left, right) => left.localeCompare(right));
  } catch (error) {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}
