/**
 * JSON report artifact.
 */

import * as fs from "fs";
import * as path from "path";
import { logger } from "../logger";
import { AggregatedReport } from "./types";

const log = logger.child("Artifact");

export function serializeReport(report: AggregatedReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/**
 * Write the report to disk, creating parent directories as needed.
 * Returns the absolute path written.
 */
export function writeReportArtifact(report: AggregatedReport, outputPath: string): string {
  const absolute = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(absolute), { recursive: true });
  fs.writeFileSync(absolute, serializeReport(report), "utf-8");
  log.info(`Wrote report artifact to ${absolute}`, { findings: report.summary.total });
  return absolute;
}
