/**
 * Tests for the canonical finding model: severity mapping, construction and markup stripping.
 */

import { createFinding, formatCvss, parseCvssScore } from "../src/findings/finding";
import { decodeEntities, stripMarkup } from "../src/findings/markup";
import {
  buildHistogram,
  compareSeverity,
  confidenceLabel,
  severityFromLabel,
  severityFromLevel,
  severityFromRiskCode,
  severityFromScore,
} from "../src/findings/severity";
import { Severity } from "../src/findings/types";

describe("Severity mapping", () => {
  describe("severityFromScore", () => {
    it("should treat 9.0 as critical and anything just below as high", () => {
      expect(severityFromScore(9.0)).toBe("critical");
      expect(severityFromScore(8.999)).toBe("high");
    });

    it("should map the remaining bands", () => {
      expect(severityFromScore(10)).toBe("critical");
      expect(severityFromScore(7.0)).toBe("high");
      expect(severityFromScore(6.9)).toBe("medium");
      expect(severityFromScore(4.0)).toBe("medium");
      expect(severityFromScore(3.9)).toBe("low");
      expect(severityFromScore(0)).toBe("low");
    });
  });

  describe("severityFromLevel", () => {
    it("should map SARIF levels", () => {
      expect(severityFromLevel("error")).toBe("high");
      expect(severityFromLevel("warning")).toBe("medium");
      expect(severityFromLevel("note")).toBe("low");
      expect(severityFromLevel("none")).toBe("low");
      expect(severityFromLevel(undefined)).toBe("low");
    });
  });

  describe("severityFromLabel", () => {
    it("should match labels case-insensitively", () => {
      expect(severityFromLabel("CRITICAL")).toBe("critical");
      expect(severityFromLabel("High")).toBe("high");
      expect(severityFromLabel("moderate")).toBe("medium");
      expect(severityFromLabel("LOW")).toBe("low");
    });

    it("should default unmatched and missing labels to medium", () => {
      expect(severityFromLabel("weird")).toBe("medium");
      expect(severityFromLabel("")).toBe("medium");
      expect(severityFromLabel(null)).toBe("medium");
      expect(severityFromLabel(undefined)).toBe("medium");
    });
  });

  describe("severityFromRiskCode", () => {
    it("should never produce critical", () => {
      expect(severityFromRiskCode(3)).toBe("high");
      expect(severityFromRiskCode(2)).toBe("medium");
      expect(severityFromRiskCode(1)).toBe("low");
      expect(severityFromRiskCode(0)).toBe("informational");
      expect(severityFromRiskCode(7)).toBe("medium");
    });
  });

  it("should label confidence codes", () => {
    expect(confidenceLabel(0)).toBe("False Positive");
    expect(confidenceLabel(2)).toBe("Medium");
    expect(confidenceLabel(4)).toBe("Confirmed");
    expect(confidenceLabel(-1)).toBe("Unknown");
  });

  it("should sort highest severity first", () => {
    const severities: Severity[] = ["low", "critical", "informational", "high", "medium"];
    expect([...severities].sort(compareSeverity)).toEqual(["critical", "high", "medium", "low", "informational"]);
  });

  it("should count findings per severity", () => {
    const histogram = buildHistogram([{ severity: "high" }, { severity: "high" }, { severity: "low" }]);
    expect(histogram).toEqual({ critical: 0, high: 2, medium: 0, low: 1, informational: 0 });
  });
});

describe("createFinding", () => {
  it("should fill empty fields with their placeholders", () => {
    const finding = createFinding({ tool: "semgrep", severity: "high", ruleId: "   ", message: null });

    expect(finding).toEqual({
      tool: "semgrep",
      severity: "high",
      ruleId: "Unknown",
      message: "No description available",
      location: "Unknown location",
      package: "Unknown package",
      cvssScore: "N/A",
    });
  });

  it("should trim values and keep optional fields only when present", () => {
    const finding = createFinding({
      tool: "owaspZap",
      severity: "medium",
      ruleId: " CWE-79 ",
      message: "XSS",
      location: "localhost:8080",
      package: "app",
      cvssScore: "6.1",
      confidence: "High",
      solution: "",
    });

    expect(finding.ruleId).toBe("CWE-79");
    expect(finding.cvssScore).toBe(6.1);
    expect(finding.confidence).toBe("High");
    expect("solution" in finding).toBe(false);
  });

  it("should return a frozen object", () => {
    const finding = createFinding({ tool: "trivy", severity: "low" });
    expect(Object.isFrozen(finding)).toBe(true);
  });
});

describe("CVSS scores", () => {
  it("should parse numbers and numeric strings", () => {
    expect(parseCvssScore(9.8)).toBe(9.8);
    expect(parseCvssScore("7.5")).toBe(7.5);
    expect(parseCvssScore(0)).toBe(0);
  });

  it("should reject values outside 0-10", () => {
    expect(parseCvssScore(11)).toBe("N/A");
    expect(parseCvssScore(-1)).toBe("N/A");
    expect(parseCvssScore("abc")).toBe("N/A");
    expect(parseCvssScore(null)).toBe("N/A");
    expect(parseCvssScore("")).toBe("N/A");
  });

  it("should format with one decimal", () => {
    expect(formatCvss(9)).toBe("9.0");
    expect(formatCvss("N/A")).toBe("N/A");
  });
});

describe("Markup stripping", () => {
  it("should remove tags and decode entities", () => {
    expect(stripMarkup("<p>Cross&nbsp;site</p><p>scripting &amp; more</p>")).toBe("Cross site scripting & more");
  });

  it("should drop script bodies", () => {
    expect(stripMarkup("before<script>alert(1)</script>after")).toBe("before after");
  });

  it("should handle line breaks and empty input", () => {
    expect(stripMarkup("line one<br/>line two")).toBe("line one line two");
    expect(stripMarkup(undefined)).toBe("");
    expect(stripMarkup("")).toBe("");
  });

  it("should decode numeric references and keep unknown named ones", () => {
    expect(decodeEntities("&#60;&#x3E;&unknown;")).toBe("<>&unknown;");
  });
});
