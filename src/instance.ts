import { createHash } from "node:crypto";
import { ConfigError } from "./errors.js";

const NUMERIC_PREFIX = /^(\d+)[.\s]/;
const INSTANCE_NAME = /^[A-Za-z0-9_-]+$/;

/**
 * Maps a notebook name to its instance key. "01. Research Notes" keeps its
 * numeric prefix ("nb_01"); anything else gets the first 8 hex chars of its MD5.
 */
export function resolveInstanceKey(identifier: string): string {
  const prefix = NUMERIC_PREFIX.exec(identifier);
  if (prefix) {
    return `nb_${prefix[1]}`;
  }
  const digest = createHash("md5").update(identifier, "utf8").digest("hex");
  return `nb_${digest.slice(0, 8)}`;
}

export interface InstanceSelection {
  instance?: string;
  autoInstance?: boolean;
  notebook?: string;
}

/**
 * Explicit instance wins, then the notebook-derived key, then none (shared
 * default profile).
 */
export function selectInstance(selection: InstanceSelection): string | undefined {
  if (selection.instance !== undefined) {
    return assertInstanceName(selection.instance);
  }
  if ((selection.autoInstance ?? true) && selection.notebook) {
    return resolveInstanceKey(selection.notebook);
  }
  return undefined;
}

export function assertInstanceName(name: string): string {
  if (!INSTANCE_NAME.test(name)) {
    throw new ConfigError(`Instance name '${name}' may only contain letters, digits, '_' and '-'`);
  }
  return name;
}
