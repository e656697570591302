/**
 * Configuration loader for the security report.
 *
 * Loads .security-report.yml, validates it against the schema,
 * applies defaults and exposes the changed-file classifiers.
 */

import * as fs from "fs";
import * as yaml from "js-yaml";
import { minimatch } from "minimatch";
import { ConfigError, errorMessage } from "../errors";
import { logger } from "../logger";
import {
  isRecord,
  JsonRecord,
  recordOf,
  stringArrayOf,
  stringOf,
} from "../utils/json";
import {
  DEFAULT_ANALYSIS_CONFIG,
  DEFAULT_ARTIFACTS_CONFIG,
  DEFAULT_FILES_CONFIG,
  DEFAULT_REPORTING_CONFIG,
  FILE_CATEGORIES,
  FILE_TOOL_KINDS,
  FileCategory,
  FileToolKind,
  RequiredAnalysisConfig,
  RequiredArtifactsConfig,
  RequiredFilesConfig,
  RequiredReportingConfig,
  SecurityReportConfig,
} from "./schema";

const log = logger.child("Config");

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The raw parsed configuration (or defaults if no file found).
   */
  raw: SecurityReportConfig;

  artifacts: RequiredArtifactsConfig;
  analysis: RequiredAnalysisConfig;
  reporting: RequiredReportingConfig;
  files: RequiredFilesConfig;

  /**
   * Categories a changed file belongs to (case-insensitive glob match).
   * @param filePath - Relative file path from repo root
   */
  categorize(filePath: string): FileCategory[];

  /**
   * Whether a changed file falls in the given category.
   */
  isInCategory(filePath: string, category: FileCategory): boolean;
}

/**
 * Config file name searched for in the working directory.
 */
export const CONFIG_FILE_NAME = ".security-report.yml";

const SUPPORTED_VERSION = 1;

/**
 * Load configuration from a file path.
 * A missing file yields defaults silently; an invalid one yields defaults with a warning.
 */
export function loadConfig(configPath: string = CONFIG_FILE_NAME): LoadedConfig {
  if (!fs.existsSync(configPath)) {
    log.debug(`No ${configPath} found, using defaults`);
    return createDefaultConfig();
  }

  try {
    return loadConfigFromString(fs.readFileSync(configPath, "utf-8"), configPath);
  } catch (err) {
    log.warn(`Failed to read ${configPath}, using defaults`, { error: errorMessage(err) });
    return createDefaultConfig();
  }
}

/**
 * Load configuration from a YAML string. Does not touch the filesystem.
 */
export function loadConfigFromString(yamlContent: string, source = "YAML string"): LoadedConfig {
  try {
    return buildLoadedConfig(parseConfig(yaml.load(yamlContent)));
  } catch (err) {
    log.warn(`Invalid configuration in ${source}, using defaults`, { error: errorMessage(err) });
    return createDefaultConfig();
  }
}

/**
 * Create a default LoadedConfig without any file.
 */
export function createDefaultConfig(): LoadedConfig {
  return buildLoadedConfig({ version: SUPPORTED_VERSION });
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Narrow a parsed YAML document to SecurityReportConfig.
 * Throws ConfigError for values of the wrong type; unknown keys are ignored.
 */
export function parseConfig(parsed: unknown): SecurityReportConfig {
  if (parsed === undefined || parsed === null) {
    return { version: SUPPORTED_VERSION };
  }
  if (!isRecord(parsed)) {
    throw new ConfigError("Configuration must be a mapping");
  }

  const version = optionalNumber(parsed, "version") ?? SUPPORTED_VERSION;
  if (version !== SUPPORTED_VERSION) {
    throw new ConfigError(`Unsupported config version ${version}`, "version");
  }

  const config: SecurityReportConfig = { version };

  const artifacts = optionalSection(parsed, "artifacts");
  if (artifacts) {
    const patterns = optionalSection(artifacts, "patterns", "artifacts");
    config.artifacts = {
      search_dirs: optionalStringList(artifacts, "search_dirs", "artifacts"),
      patterns: patterns ? pickLists(patterns, FILE_TOOL_KINDS, "artifacts.patterns") : undefined,
    };
  }

  const analysis = optionalSection(parsed, "analysis");
  if (analysis) {
    config.analysis = {
      max_attempts: positiveInteger(analysis, "max_attempts", "analysis"),
      base_delay_ms: nonNegative(analysis, "base_delay_ms", "analysis"),
      max_tokens: positiveInteger(analysis, "max_tokens", "analysis"),
      temperature: optionalNumber(analysis, "temperature", "analysis"),
    };
    const temperature = config.analysis.temperature;
    if (temperature !== undefined && (temperature < 0 || temperature > 1)) {
      throw new ConfigError("analysis.temperature must be between 0 and 1", "analysis.temperature");
    }
  }

  const reporting = optionalSection(parsed, "reporting");
  if (reporting) {
    config.reporting = {
      max_critical_display: positiveInteger(reporting, "max_critical_display", "reporting"),
      max_high_display: positiveInteger(reporting, "max_high_display", "reporting"),
      max_ai_issues_display: positiveInteger(reporting, "max_ai_issues_display", "reporting"),
      output_path: optionalString(reporting, "output_path", "reporting"),
    };
  }

  const files = optionalSection(parsed, "files");
  if (files) {
    config.files = pickLists(files, FILE_CATEGORIES, "files");
  }

  return config;
}

function keyPath(section: string | undefined, key: string): string {
  return section ? `${section}.${key}` : key;
}

function optionalSection(parent: JsonRecord, key: string, section?: string): JsonRecord | undefined {
  const value = parent[key];
  if (value === undefined || value === null) return undefined;
  const record = recordOf(value);
  if (!record) {
    throw new ConfigError(`${keyPath(section, key)} must be a mapping`, keyPath(section, key));
  }
  return record;
}

function optionalNumber(parent: JsonRecord, key: string, section?: string): number | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${keyPath(section, key)} must be a number`, keyPath(section, key));
  }
  return value;
}

function positiveInteger(parent: JsonRecord, key: string, section: string): number | undefined {
  const value = optionalNumber(parent, key, section);
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new ConfigError(`${section}.${key} must be a positive integer`, `${section}.${key}`);
  }
  return value;
}

function nonNegative(parent: JsonRecord, key: string, section: string): number | undefined {
  const value = optionalNumber(parent, key, section);
  if (value !== undefined && value < 0) {
    throw new ConfigError(`${section}.${key} must not be negative`, `${section}.${key}`);
  }
  return value;
}

function optionalString(parent: JsonRecord, key: string, section: string): string | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  const text = stringOf(value);
  if (text === undefined || text.trim() === "") {
    throw new ConfigError(`${section}.${key} must be a non-empty string`, `${section}.${key}`);
  }
  return text;
}

function optionalStringList(parent: JsonRecord, key: string, section: string): string[] | undefined {
  const value = parent[key];
  if (value === undefined) return undefined;
  const list = stringArrayOf(value);
  if (!list || (Array.isArray(value) && list.length !== value.length)) {
    throw new ConfigError(`${section}.${key} must be a list of strings`, `${section}.${key}`);
  }
  return list;
}

function pickLists<K extends string>(
  record: JsonRecord,
  keys: readonly K[],
  section: string
): Partial<Record<K, string[]>> {
  const result: Partial<Record<K, string[]>> = {};
  for (const key of keys) {
    const list = optionalStringList(record, key, section);
    if (list) {
      result[key] = list;
    }
  }
  return result;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Build a LoadedConfig from a validated SecurityReportConfig.
 */
function buildLoadedConfig(rawConfig: SecurityReportConfig): LoadedConfig {
  const toolPatterns = (tool: FileToolKind): string[] =>
    rawConfig.artifacts?.patterns?.[tool] ?? DEFAULT_ARTIFACTS_CONFIG.patterns[tool];

  const artifacts: RequiredArtifactsConfig = {
    search_dirs: rawConfig.artifacts?.search_dirs ?? DEFAULT_ARTIFACTS_CONFIG.search_dirs,
    patterns: {
      trivy: toolPatterns("trivy"),
      osvScanner: toolPatterns("osvScanner"),
      semgrep: toolPatterns("semgrep"),
      checkov: toolPatterns("checkov"),
      owaspZap: toolPatterns("owaspZap"),
    },
  };

  const analysis: RequiredAnalysisConfig = {
    max_attempts: rawConfig.analysis?.max_attempts ?? DEFAULT_ANALYSIS_CONFIG.max_attempts,
    base_delay_ms: rawConfig.analysis?.base_delay_ms ?? DEFAULT_ANALYSIS_CONFIG.base_delay_ms,
    max_tokens: rawConfig.analysis?.max_tokens ?? DEFAULT_ANALYSIS_CONFIG.max_tokens,
    temperature: rawConfig.analysis?.temperature ?? DEFAULT_ANALYSIS_CONFIG.temperature,
  };

  const reporting: RequiredReportingConfig = {
    max_critical_display:
      rawConfig.reporting?.max_critical_display ?? DEFAULT_REPORTING_CONFIG.max_critical_display,
    max_high_display: rawConfig.reporting?.max_high_display ?? DEFAULT_REPORTING_CONFIG.max_high_display,
    max_ai_issues_display:
      rawConfig.reporting?.max_ai_issues_display ?? DEFAULT_REPORTING_CONFIG.max_ai_issues_display,
    output_path: rawConfig.reporting?.output_path ?? DEFAULT_REPORTING_CONFIG.output_path,
  };

  const categoryPatterns = (category: FileCategory): string[] =>
    rawConfig.files?.[category] ?? DEFAULT_FILES_CONFIG[category];

  const files: RequiredFilesConfig = {
    auth: categoryPatterns("auth"),
    security: categoryPatterns("security"),
    security_tests: categoryPatterns("security_tests"),
    dependencies: categoryPatterns("dependencies"),
    infrastructure: categoryPatterns("infrastructure"),
  };

  /**
   * Check if a file matches any of the given glob patterns.
   */
  function matchesAnyPattern(filePath: string, patterns: string[]): boolean {
    const normalizedPath = filePath.replace(/\\/g, "/");
    return patterns.some((pattern) =>
      minimatch(normalizedPath, pattern, { dot: true, nocase: true })
    );
  }

  function isInCategory(filePath: string, category: FileCategory): boolean {
    return matchesAnyPattern(filePath, files[category]);
  }

  function categorize(filePath: string): FileCategory[] {
    return FILE_CATEGORIES.filter((category) => isInCategory(filePath, category));
  }

  return {
    raw: rawConfig,
    artifacts,
    analysis,
    reporting,
    files,
    categorize,
    isInCategory,
  };
}
