import dotenv from "dotenv";
import { AnalysisMode, RiskHint, isRiskHint } from "./analysis/types";
import { ConfigError } from "./errors";
import { LogFormat, LogLevel, isLogLevel } from "./logger";

export const DEFAULT_PRIMARY_MODEL = "claude-3-5-sonnet-20241022";
export const DEFAULT_SECONDARY_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_SECONDARY_MODEL = "llama-3.3-70b-versatile";

export interface RepositoryRef {
  owner: string;
  repo: string;
}

/**
 * Process-level settings, read once from the environment at the entry point.
 */
export interface RunConfig {
  primary: { apiKey?: string; model: string };
  secondary: { apiKey?: string; baseUrl: string; model: string };
  mode: AnalysisMode;
  github: { token?: string; repository?: RepositoryRef; prNumber?: number };
  riskHint?: RiskHint;
  changedFiles: string[];
  outputPath?: string;
  configPath?: string;
  /** Whether the runner provides a job summary file. */
  jobSummary: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

/**
 * Populate process.env from a .env file. Only the entry point calls this.
 */
export function loadDotenv(): void {
  dotenv.config();
}

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseFlag(value: string | undefined): boolean {
  return ["true", "1", "yes", "on"].includes((value ?? "").trim().toLowerCase());
}

/** Template-only wins when both flags are set. */
export function resolveMode(secondaryOnly: boolean, templateOnly: boolean): AnalysisMode {
  if (templateOnly) return "template-only";
  if (secondaryOnly) return "secondary-only";
  return "standard";
}

export function parseRepository(value: string | undefined): RepositoryRef | undefined {
  const text = present(value);
  if (!text) return undefined;
  const [owner, repo, ...rest] = text.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new ConfigError(`GITHUB_REPOSITORY must be "owner/repo", got "${text}"`, "GITHUB_REPOSITORY");
  }
  return { owner, repo };
}

export function parsePrNumber(value: string | undefined): number | undefined {
  const text = present(value);
  if (!text) return undefined;
  const number = Number(text);
  if (!Number.isInteger(number) || number <= 0) {
    throw new ConfigError(`PR_NUMBER must be a positive integer, got "${text}"`, "PR_NUMBER");
  }
  return number;
}

/**
 * CHANGED_FILES is a JSON array of paths; a newline-separated list is accepted too.
 */
export function parseChangedFiles(value: string | undefined): string[] {
  const text = present(value);
  if (!text) return [];
  if (text.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(
        `CHANGED_FILES is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        "CHANGED_FILES"
      );
    }
    if (!Array.isArray(parsed)) {
      throw new ConfigError("CHANGED_FILES must be a JSON array", "CHANGED_FILES");
    }
    return parsed.filter((item): item is string => typeof item === "string" && item.trim() !== "");
  }
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function parseRiskHint(value: string | undefined): RiskHint | undefined {
  const text = present(value)?.toUpperCase();
  if (!text) return undefined;
  if (!isRiskHint(text)) {
    throw new ConfigError(`RISK_LEVEL must be one of HIGH, MEDIUM, LOW, MINIMAL, UNKNOWN, got "${text}"`, "RISK_LEVEL");
  }
  return text;
}

/**
 * Build the frozen RunConfig from an environment map.
 */
export function readRunConfig(env: NodeJS.ProcessEnv = process.env): Readonly<RunConfig> {
  const level = present(env.LOG_LEVEL)?.toLowerCase();
  const format: LogFormat =
    present(env.LOG_FORMAT)?.toLowerCase() === "json" || env.NODE_ENV === "production" ? "json" : "pretty";

  const config: RunConfig = {
    primary: {
      apiKey: present(env.ANTHROPIC_API_KEY),
      model: present(env.ANTHROPIC_MODEL) ?? DEFAULT_PRIMARY_MODEL,
    },
    secondary: {
      apiKey: present(env.SECONDARY_API_KEY),
      baseUrl: present(env.SECONDARY_BASE_URL) ?? DEFAULT_SECONDARY_BASE_URL,
      model: present(env.SECONDARY_MODEL) ?? DEFAULT_SECONDARY_MODEL,
    },
    mode: resolveMode(parseFlag(env.SECONDARY_ONLY_MODE), parseFlag(env.TEMPLATE_ONLY_MODE)),
    github: {
      token: present(env.GITHUB_TOKEN),
      repository: parseRepository(env.GITHUB_REPOSITORY),
      prNumber: parsePrNumber(env.PR_NUMBER),
    },
    riskHint: parseRiskHint(env.RISK_LEVEL),
    changedFiles: parseChangedFiles(env.CHANGED_FILES),
    outputPath: present(env.REPORT_OUTPUT_PATH),
    configPath: present(env.REPORT_CONFIG_PATH),
    jobSummary: present(env.GITHUB_STEP_SUMMARY) !== undefined,
    logLevel: level && isLogLevel(level) ? level : "info",
    logFormat: format,
  };

  return Object.freeze(config);
}
