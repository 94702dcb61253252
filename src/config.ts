import os from "node:os";
import path from "node:path";
import { Command } from "commander";
import type { LevelWithSilent } from "pino";
import { DEFAULT_EXTENSION_PRESET, isExtensionPreset, resolveExtensionPreset } from "./core/catalog.js";
import { UserInputError } from "./errors.js";

/* ---------- Configuration ---------- */

export interface AppConfig {
  rootDir: string;
  extensionPreset: string;
  extensions: string;
  exclusions: string;
  respectGitignore: boolean;
  logLevel: LevelWithSilent;
  logFile: string;
  presetFile: string;
  contextWindow: number;
  costPer1MTokens: number;
  maxReadBytes: number;
}

export const CONTEXT_WINDOW = 128000;
export const COST_PER_1M_TOKENS = 5.0;
export const MAX_READ_BYTES = 5 * 1024 * 1024; // 5MB

const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some(level => level === value);
}

function positiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

interface CliOptions {
  extensions?: string;
  exclude?: string;
  preset: string;
  gitignore: boolean;
  logLevel?: string;
  logFile?: string;
}

export function createProgram(): Command {
  return new Command()
    .name("prompter")
    .description(
      "Assemble selected project files into an LLM prompt, then apply the model's file updates with .bak backups."
    )
    .argument("[root]", "project folder to scan (defaults to the current directory)")
    .option("-e, --extensions <list>", "comma-separated extensions to include, e.g. \".ts, .tsx\"")
    .option("-x, --exclude <list>", "comma-separated exclusion tokens")
    .option("-p, --preset <name>", "extension preset filling extensions and exclusions", DEFAULT_EXTENSION_PRESET)
    .option("--no-gitignore", "do not apply the project's .gitignore files")
    .option("--log-level <level>", "log level: fatal, error, warn, info, debug, trace or silent")
    .option("--log-file <path>", "file that receives the log")
    .exitOverride();
}

/**
 * Resolves the configuration from command-line arguments (without the node
 * and script entries) and the environment. Flags win over the environment.
 */
export function loadConfig(args: readonly string[], env: NodeJS.ProcessEnv = process.env): AppConfig {
  const program = createProgram();
  program.parse([...args], { from: "user" });
  const opts = program.opts<CliOptions>();
  const [rootArg] = program.args;

  if (!isExtensionPreset(opts.preset)) {
    throw new UserInputError(`Unknown extension preset "${opts.preset}".`);
  }
  const preset = resolveExtensionPreset(opts.preset);

  const level = (opts.logLevel ?? env.PROMPTER_LOG_LEVEL ?? "info").toLowerCase();
  if (!isLogLevel(level)) {
    throw new UserInputError(`Unknown log level "${level}".`);
  }

  const home = os.homedir();
  return {
    rootDir: path.resolve(rootArg ?? process.cwd()),
    extensionPreset: opts.preset,
    extensions: opts.extensions ?? preset.extensions,
    exclusions: opts.exclude ?? preset.exclusions,
    respectGitignore: opts.gitignore,
    logLevel: level,
    logFile: opts.logFile ?? env.PROMPTER_LOG_FILE ?? path.join(home, ".prompter", "prompter.log"),
    presetFile: env.PROMPTER_PRESET_FILE ?? path.join(home, ".prompter.json"),
    contextWindow: positiveInt(env.PROMPTER_CONTEXT_WINDOW, CONTEXT_WINDOW),
    costPer1MTokens: COST_PER_1M_TOKENS,
    maxReadBytes: MAX_READ_BYTES
  };
}
