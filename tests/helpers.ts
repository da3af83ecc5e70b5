import { MemoryStateBackend } from "../src/json-state.js";
import type { EmbeddingProvider } from "../src/embedding.js";
import { initLogger } from "../src/logger.js";

/** Returns fixed vectors per text; unknown texts fail like a provider outage would. */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly id = "fake:test";
  readonly requests: string[] = [];

  constructor(private readonly vectors: Record<string, number[]>) {}

  async embed(text: string): Promise<number[]> {
    this.requests.push(text);
    const vector = this.vectors[text];
    if (!vector) throw new Error(`no vector for "${text}"`);
    return vector;
  }
}

/** Memory backend whose writes can be switched to fail, all or selectively. */
export class FlakyBackend extends MemoryStateBackend {
  failWrites = false;
  failWhen: ((key: string, value: unknown) => boolean) | null = null;

  override async write(key: string, value: unknown): Promise<void> {
    if (this.failWrites || this.failWhen?.(key, value)) throw new Error(`disk full writing ${key}`);
    await super.write(key, value);
  }
}

export const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");
export const fixedClock = (): Date => FIXED_NOW;

export interface CapturedLogs {
  warnings: string[];
  errors: string[];
  infos: string[];
}

/** Route the module logger into arrays for the rest of the test file. */
export function captureLogs(): CapturedLogs {
  const captured: CapturedLogs = { warnings: [], errors: [], infos: [] };
  initLogger(
    {
      debug() {},
      info(msg: string) {
        captured.infos.push(msg);
      },
      warn(msg: string) {
        captured.warnings.push(msg);
      },
      error(msg: string) {
        captured.errors.push(msg);
      },
    },
    false,
  );
  return captured;
}
