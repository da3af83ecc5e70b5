import { log } from "./logger.js";
import { CandidatePoolUnavailableError } from "./errors.js";
import { CandidateSchema, parseRecords } from "./schemas.js";
import type { StateBackend } from "./json-state.js";
import type { Candidate } from "./types.js";

export const CANDIDATES_KEY = "candidates.json";

/** Read-only view of the unlabeled phrase pool. */
export class CandidateSource {
  constructor(private readonly backend: StateBackend) {}

  /**
   * Current pool in file order. A missing or unreadable pool is fatal for
   * the caller's cycle; individual malformed entries are only dropped.
   */
  async load(): Promise<Candidate[]> {
    const where = this.backend.describe(CANDIDATES_KEY);
    let raw: unknown;
    try {
      raw = await this.backend.read(CANDIDATES_KEY);
    } catch (err) {
      throw new CandidatePoolUnavailableError(where, { cause: err });
    }
    if (raw === undefined) throw new CandidatePoolUnavailableError(where);

    const pool = parseRecords(CandidateSchema, raw, where);
    log.debug(`loaded ${pool.length} candidates from ${where}`);
    return pool;
  }
}
