import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { StoreReadError, StoreWriteError } from "./errors.js";

/**
 * Write JSON by replacing the target in one rename, so an interrupted run
 * leaves either the old file or the new one.
 */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(tmpPath, JSON.stringify(value, null, 2) + "\n", "utf-8");
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw new StoreWriteError(filePath, { cause: err });
  }
}

/** Parsed JSON contents, or `undefined` when the file does not exist. */
export async function readJsonIfExists(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
  return JSON.parse(raw);
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Where the stores keep their JSON documents. Keys are paths relative to the
 * data directory, e.g. `suggestions.json` or `state/accumulator.json`.
 */
export interface StateBackend {
  /** `undefined` when nothing has been written under `key` yet. */
  read(key: string): Promise<unknown>;
  write(key: string, value: unknown): Promise<void>;
  describe(key: string): string;
}

export class FileStateBackend implements StateBackend {
  constructor(readonly dataDir: string) {}

  async read(key: string): Promise<unknown> {
    const filePath = this.describe(key);
    try {
      return await readJsonIfExists(filePath);
    } catch (err) {
      throw new StoreReadError(filePath, { cause: err });
    }
  }

  async write(key: string, value: unknown): Promise<void> {
    await writeJsonAtomic(this.describe(key), value);
  }

  describe(key: string): string {
    return path.join(this.dataDir, key);
  }
}

/** Keeps documents in memory as JSON text, so values round-trip like files do. */
export class MemoryStateBackend implements StateBackend {
  private readonly docs = new Map<string, string>();

  async read(key: string): Promise<unknown> {
    const raw = this.docs.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async write(key: string, value: unknown): Promise<void> {
    this.docs.set(key, JSON.stringify(value));
  }

  describe(key: string): string {
    return `memory:${key}`;
  }
}
