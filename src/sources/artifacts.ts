/**
 * Locating and reading scanner artifacts on disk.
 */

import * as fs from "fs";
import * as path from "path";
import { minimatch } from "minimatch";
import { parseToolDocument } from "../adapters";
import { RequiredArtifactsConfig } from "../config/schema";
import { AdapterParseError, errorMessage } from "../errors";
import { ToolKind } from "../findings/types";
import { logger } from "../logger";
import { ToolCollection } from "./types";

const log = logger.child("Artifacts");

const SKIPPED_DIRECTORIES = new Set(["node_modules", ".git", "dist"]);
const MAX_DEPTH = 8;

/**
 * Files under a directory, depth-first, in sorted order so results are stable.
 */
export function listFiles(root: string, depth = 0): string[] {
  if (depth > MAX_DEPTH || !fs.existsSync(root)) return [];

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(root, { withFileTypes: true });
  } catch (err) {
    log.debug(`Cannot read ${root}`, { error: errorMessage(err) });
    return [];
  }

  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.has(entry.name)) {
        files.push(...listFiles(fullPath, depth + 1));
      }
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * First file whose name matches a pattern. Patterns are tried in order; for
 * each pattern the search directories are tried in order.
 */
export function findArtifact(patterns: readonly string[], searchDirs: readonly string[], baseDir: string): string | undefined {
  const listings = new Map<string, string[]>();
  const filesIn = (dir: string): string[] => {
    let files = listings.get(dir);
    if (!files) {
      files = listFiles(path.resolve(baseDir, dir));
      listings.set(dir, files);
    }
    return files;
  };

  for (const pattern of patterns) {
    for (const dir of searchDirs) {
      const match = filesIn(dir).find((file) => minimatch(path.basename(file), pattern, { nocase: true, dot: true }));
      if (match) return match;
    }
  }
  return undefined;
}

/**
 * Parse one artifact with the tool's adapter.
 * Throws AdapterParseError when the file cannot be read or is not JSON.
 */
export function readArtifact(tool: ToolKind, filePath: string): ToolCollection {
  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(filePath, "utf-8").replace(/^\uFEFF/, ""));
  } catch (err) {
    throw new AdapterParseError(tool, filePath, { cause: err });
  }

  const findings = parseToolDocument(tool, document);
  return { tool, status: "Completed", findings, source: filePath };
}

/**
 * Collect one file-based tool. Never throws: failures become a tool status.
 */
export function collectFileTool(
  tool: ToolKind,
  patterns: readonly string[],
  artifacts: Pick<RequiredArtifactsConfig, "search_dirs">,
  baseDir: string
): ToolCollection {
  const file = findArtifact(patterns, artifacts.search_dirs, baseDir);
  if (!file) {
    log.warn(`No artifact found for ${tool}`, { patterns: patterns.join(", ") });
    return { tool, status: "Missing", findings: [] };
  }

  try {
    const collection = readArtifact(tool, file);
    log.info(`Parsed ${tool} artifact`, { file, findings: collection.findings.length });
    return collection;
  } catch (err) {
    const cause = err instanceof AdapterParseError && err.cause !== undefined ? err.cause : err;
    log.error(`Failed to parse ${tool} artifact ${file}`, { error: errorMessage(cause) });
    return { tool, status: "Error", findings: [], source: file, error: errorMessage(err) };
  }
}
