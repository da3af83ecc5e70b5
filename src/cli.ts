import path from "node:path";
import os from "node:os";
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { Command } from "commander";
import { loadConfigFile, parseConfig } from "./config.js";
import { SuggestionEngine } from "./engine.js";
import { exportSqlite } from "./export-sqlite.js";
import { LabelingSession } from "./labeling.js";
import type { SessionIo } from "./labeling.js";
import { initLogger, log } from "./logger.js";
import type { LoggerBackend } from "./logger.js";
import type { CuratorConfig } from "./types.js";

const DEFAULT_CONFIG_PATH = path.join(process.env.HOME ?? os.homedir(), ".phrase-curator", "config.json");

interface GlobalOptions {
  config?: string;
  dataDir?: string;
  debug?: boolean;
  threshold?: number;
  topK?: number;
  triggerInterval?: number;
}

export interface CliDeps {
  out: (line: string) => void;
  createEngine: (config: CuratorConfig) => SuggestionEngine;
  createIo: () => SessionIo & { close: () => void };
  logBackend: LoggerBackend;
}

async function getAppVersion(): Promise<string> {
  try {
    const pkgPath = new URL("../package.json", import.meta.url);
    const raw = await readFile(pkgPath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

function terminalIo(): SessionIo & { close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });
  return {
    // EOF counts as quit.
    prompt: async (question) => (closed ? "q" : rl.question(question).catch(() => "q")),
    print: (line) => console.log(line),
    close: () => rl.close(),
  };
}

const defaultDeps: CliDeps = {
  out: (line) => console.log(line),
  createEngine: (config) => SuggestionEngine.create(config),
  createIo: terminalIo,
  logBackend: console,
};

function parseNumber(value: string): number {
  return Number(value);
}

async function resolveConfig(opts: GlobalOptions, logBackend: LoggerBackend): Promise<CuratorConfig> {
  const fileConfig = await loadConfigFile(opts.config ?? DEFAULT_CONFIG_PATH);
  const cfg = parseConfig({
    ...fileConfig,
    ...(opts.dataDir ? { dataDir: opts.dataDir } : {}),
    ...(opts.debug ? { debug: true } : {}),
    ...(opts.threshold !== undefined ? { similarityThreshold: opts.threshold } : {}),
    ...(opts.topK !== undefined ? { topK: opts.topK } : {}),
    ...(opts.triggerInterval !== undefined ? { triggerInterval: opts.triggerInterval } : {}),
  });
  initLogger(logBackend, cfg.debug);
  return cfg;
}

export function buildProgram(overrides: Partial<CliDeps> = {}): Command {
  const deps: CliDeps = { ...defaultDeps, ...overrides };
  const { out } = deps;
  const program = new Command();

  program
    .name("phrase-curator")
    .description("Label podcast metadata phrases and get similar-phrase suggestions")
    .option("-c, --config <path>", "JSON config file", DEFAULT_CONFIG_PATH)
    .option("-d, --data-dir <dir>", "Data directory (overrides config)")
    .option("--threshold <number>", "Similarity threshold for suggestions", parseNumber)
    .option("--top-k <number>", "Maximum suggestions per cycle", parseNumber)
    .option("--trigger-interval <number>", "Uncertain labels per generation cycle", parseNumber)
    .option("--debug", "Verbose logging");

  const openEngine = async (): Promise<{ config: CuratorConfig; engine: SuggestionEngine }> => {
    const config = await resolveConfig(program.opts<GlobalOptions>(), deps.logBackend);
    const engine = deps.createEngine(config);
    await engine.load();
    return { config, engine };
  };

  program
    .command("label")
    .description("Label unlabeled candidates interactively")
    .action(async () => {
      const { config, engine } = await openEngine();
      const io = deps.createIo();
      try {
        const session = new LabelingSession(engine, io, { autosaveEvery: config.autosaveEvery });
        const summary = await session.run();
        out(
          `labeled ${summary.labeled} (${summary.uncertain} uncertain), ${summary.cycles} cycle(s), ${summary.suggestionsAdded} new suggestion(s)`,
        );
        for (const w of summary.warnings) out(`warning: ${w}`);
      } finally {
        io.close();
      }
    });

  program
    .command("suggest")
    .description("Run a generation cycle now against all uncertain examples")
    .action(async () => {
      const { engine } = await openEngine();
      const { cycle: report, warning } = await engine.generateNow();
      out(
        `examples=${report.references} candidates=${report.poolSize} eligible=${report.eligible} matched=${report.suggestions.length} added=${report.accepted}`,
      );
      for (const s of report.suggestions) {
        out(`${s.similarity_score.toFixed(3)}  ${s.phrase}  (${s.source})`);
      }
      if (warning) out(`warning: ${warning}`);
    });

  program
    .command("suggestions")
    .description("List stored suggestions")
    .action(async () => {
      const { engine } = await openEngine();
      const all = engine.suggestions.list();
      if (all.length === 0) {
        out("no suggestions yet");
        return;
      }
      for (const s of all) {
        const mark = engine.suggestions.consumption(s.phrase);
        const status = mark ? `labeled ${mark.label}` : "pending";
        out(`${s.similarity_score.toFixed(3)}  ${s.phrase}  (${s.source}) [${status}]`);
      }
    });

  program
    .command("stats")
    .description("Show labeling and suggestion statistics")
    .action(async () => {
      const { engine } = await openEngine();
      const { byLabel, bySource } = engine.labels.counts();
      out(`labels: ${engine.labels.size}`);
      out(`  GUEST: ${byLabel.GUEST}  HOST: ${byLabel.HOST}  OTHER: ${byLabel.OTHER}  MAYBE: ${byLabel.MAYBE}`);
      for (const [source, counts] of Object.entries(bySource)) {
        out(`  ${source}: G:${counts.GUEST} H:${counts.HOST} O:${counts.OTHER} M:${counts.MAYBE}`);
      }

      const acc = engine.accumulator.stats();
      out(`uncertain examples: ${acc.total} (next cycle in ${acc.nextTrigger})`);
      if (acc.recent.length > 0) out(`  recent: ${acc.recent.join(", ")}`);

      const suggestions = engine.suggestions.list();
      const consumed = suggestions.filter((s) => engine.suggestions.consumption(s.phrase)).length;
      out(`suggestions: ${suggestions.length} (${consumed} labeled)`);
    });

  program
    .command("export-sqlite")
    .description("Export labels, suggestions and uncertain examples to SQLite")
    .argument("<outFile>", "SQLite file to write")
    .action(async (outFile: string) => {
      const { engine } = await openEngine();
      const counts = exportSqlite(
        {
          labels: engine.labels.list(),
          suggestions: engine.suggestions.list(),
          examples: engine.accumulator.allExamples(),
          consumption: (phrase) => engine.suggestions.consumption(phrase),
        },
        { outFile, appVersion: await getAppVersion() },
      );
      out(`exported ${counts.labels} labels, ${counts.suggestions} suggestions, ${counts.examples} uncertain examples`);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (err) {
    log.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
