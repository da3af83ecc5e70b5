import { log } from "./logger.js";
import { describeError } from "./errors.js";
import type { SuggestionEngine } from "./engine.js";
import type { Candidate, Label } from "./types.js";

export type LabelChoice = Label | "QUIT";

const KEY_BINDINGS: Record<string, LabelChoice> = {
  g: "GUEST",
  h: "HOST",
  i: "OTHER",
  m: "MAYBE",
  q: "QUIT",
};

export const PROMPT = "[g]uest  [h]ost  [i]other  [m]aybe  [q]uit > ";

export function parseLabelKey(input: string): LabelChoice | null {
  return KEY_BINDINGS[input.trim().toLowerCase()] ?? null;
}

export interface SessionIo {
  prompt: (question: string) => Promise<string>;
  print: (line: string) => void;
}

export interface SessionSummary {
  labeled: number;
  uncertain: number;
  cycles: number;
  suggestionsAdded: number;
  consumed: number;
  quit: boolean;
  warnings: string[];
}

/**
 * One sitting of the annotator: unlabeled candidates are shown one at a time,
 * phrases the engine suggested first. Uncertain labels feed the engine,
 * which may pause the loop to run a generation cycle.
 */
export class LabelingSession {
  constructor(
    private readonly engine: SuggestionEngine,
    private readonly io: SessionIo,
    private readonly opts: { autosaveEvery: number },
  ) {}

  async run(): Promise<SessionSummary> {
    const pool = await this.engine.candidates.load();
    const summary: SessionSummary = {
      labeled: 0,
      uncertain: 0,
      cycles: 0,
      suggestionsAdded: 0,
      consumed: 0,
      quit: false,
      warnings: [],
    };
    const remaining = pool.filter((c) => !this.engine.labels.has(c.phrase)).length;
    this.io.print(`${this.engine.labels.size} labeled, ${remaining} candidates to go`);

    let cursor = 0;
    for (;;) {
      const next = this.nextCandidate(pool, cursor);
      if (!next) break;
      cursor = next.cursor;
      const { candidate } = next;

      const suggestion = this.engine.suggestions.get(candidate.phrase);
      this.io.print("");
      this.io.print(`source: ${candidate.source}`);
      if (suggestion) {
        this.io.print(`~ suggested (similarity ${suggestion.similarity_score.toFixed(3)})`);
      }
      this.io.print(candidate.phrase);

      const choice = await this.ask();
      if (choice === "QUIT") {
        summary.quit = true;
        break;
      }

      this.engine.labels.add({ text: candidate.phrase, label: choice, source: candidate.source });
      summary.labeled += 1;

      if (suggestion) {
        try {
          if (await this.engine.suggestions.markConsumed(candidate.phrase, choice)) summary.consumed += 1;
        } catch (err) {
          summary.warnings.push(`consumption mark not saved: ${describeError(err)}`);
          log.warn(`consumption mark not saved for "${candidate.phrase}": ${describeError(err)}`);
        }
      }

      if (choice === "MAYBE") {
        summary.uncertain += 1;
        const outcome = await this.engine.onUncertainLabel(candidate.phrase, candidate.source);
        if (outcome.record.warning) summary.warnings.push(outcome.record.warning);
        if (outcome.warning) summary.warnings.push(outcome.warning);
        if (outcome.cycleError) {
          summary.warnings.push(`generation cycle failed: ${outcome.cycleError}`);
        } else if (outcome.cycle) {
          summary.cycles += 1;
          summary.suggestionsAdded += outcome.cycle.accepted;
          this.io.print(`generated ${outcome.cycle.accepted} new suggestion(s)`);
        }
      }

      if (summary.labeled % this.opts.autosaveEvery === 0) {
        try {
          await this.engine.labels.save();
          log.debug(`autosaved ${this.engine.labels.size} labels`);
        } catch (err) {
          summary.warnings.push(`autosave failed: ${describeError(err)}`);
          log.warn(`autosave failed: ${describeError(err)}`);
        }
      }
    }

    if (this.engine.labels.hasUnsavedChanges) await this.engine.labels.save();
    return summary;
  }

  private async ask(): Promise<LabelChoice> {
    for (;;) {
      const answer = await this.io.prompt(PROMPT);
      const choice = parseLabelKey(answer);
      if (choice) return choice;
      this.io.print(`unknown key "${answer.trim()}"`);
    }
  }

  /**
   * Unlabeled suggestions take priority over the pool walk; `cursor` is
   * where the pool walk resumes.
   */
  private nextCandidate(pool: readonly Candidate[], cursor: number): { candidate: Candidate; cursor: number } | null {
    for (const s of this.engine.suggestions.list()) {
      if (!this.engine.labels.has(s.phrase)) {
        return { candidate: { phrase: s.phrase, source: s.source }, cursor };
      }
    }
    for (let i = cursor; i < pool.length; i++) {
      const candidate = pool[i];
      if (candidate && !this.engine.labels.has(candidate.phrase)) {
        return { candidate, cursor: i + 1 };
      }
    }
    return null;
  }
}
