/**
 * Tests for .security-report.yml loading and changed-file classification.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  loadConfigFromString,
  parseConfig,
} from "../src/config/loader";
import { DEFAULT_ANALYSIS_CONFIG, DEFAULT_ARTIFACTS_CONFIG, DEFAULT_REPORTING_CONFIG } from "../src/config/schema";
import { ConfigError } from "../src/errors";
import { configureLogger } from "../src/logger";

beforeAll(() => {
  configureLogger({ level: "error" });
});

afterAll(() => {
  configureLogger({ level: "info" });
});

describe("Config Loader", () => {
  describe("createDefaultConfig", () => {
    it("should return the default values", () => {
      const config = createDefaultConfig();

      expect(config.raw).toEqual({ version: 1 });
      expect(config.artifacts).toEqual(DEFAULT_ARTIFACTS_CONFIG);
      expect(config.analysis).toEqual(DEFAULT_ANALYSIS_CONFIG);
      expect(config.reporting).toEqual(DEFAULT_REPORTING_CONFIG);
    });

    it("should search the artifact directories in order", () => {
      expect(createDefaultConfig().artifacts.search_dirs).toEqual(["security-artifacts", ".", "downloaded-artifacts"]);
    });
  });

  describe("loadConfigFromString", () => {
    it("should merge partial sections over the defaults", () => {
      const config = loadConfigFromString(`
version: 1
analysis:
  max_attempts: 5
reporting:
  max_critical_display: 2
artifacts:
  patterns:
    semgrep:
      - "custom-semgrep.sarif"
files:
  auth:
    - "src/identity/**"
`);

      expect(config.analysis.max_attempts).toBe(5);
      expect(config.analysis.base_delay_ms).toBe(2000);
      expect(config.reporting.max_critical_display).toBe(2);
      expect(config.reporting.max_high_display).toBe(10);
      expect(config.artifacts.patterns.semgrep).toEqual(["custom-semgrep.sarif"]);
      expect(config.artifacts.patterns.trivy).toEqual(DEFAULT_ARTIFACTS_CONFIG.patterns.trivy);
      expect(config.files.auth).toEqual(["src/identity/**"]);
      expect(config.isInCategory("src/identity/provider.ts", "auth")).toBe(true);
    });

    it("should ignore unknown keys", () => {
      const config = loadConfigFromString("version: 1\nextra: true\nreporting:\n  color: blue\n");
      expect(config.raw).toEqual({ version: 1, reporting: {} });
      expect(config.reporting).toEqual(DEFAULT_REPORTING_CONFIG);
    });

    it("should fall back to defaults for an unsupported version", () => {
      const config = loadConfigFromString("version: 2\nanalysis:\n  max_attempts: 9\n");
      expect(config.analysis.max_attempts).toBe(3);
    });

    it("should fall back to defaults for malformed YAML", () => {
      const config = loadConfigFromString("analysis: [unclosed");
      expect(config.analysis).toEqual(DEFAULT_ANALYSIS_CONFIG);
    });

    it("should treat an empty document as defaults", () => {
      expect(loadConfigFromString("").raw).toEqual({ version: 1 });
    });
  });

  describe("parseConfig", () => {
    it("should reject a document that is not a mapping", () => {
      expect(() => parseConfig("text")).toThrow(new ConfigError("Configuration must be a mapping"));
      expect(() => parseConfig(["a"])).toThrow(ConfigError);
    });

    it("should reject invalid numbers", () => {
      expect(() => parseConfig({ analysis: { max_attempts: 0 } })).toThrow(
        "analysis.max_attempts must be a positive integer"
      );
      expect(() => parseConfig({ analysis: { base_delay_ms: -1 } })).toThrow(
        "analysis.base_delay_ms must not be negative"
      );
      expect(() => parseConfig({ analysis: { temperature: 1.5 } })).toThrow(
        "analysis.temperature must be between 0 and 1"
      );
      expect(() => parseConfig({ reporting: { max_high_display: "ten" } })).toThrow(
        "reporting.max_high_display must be a number"
      );
    });

    it("should reject lists containing non-strings", () => {
      expect(() => parseConfig({ artifacts: { search_dirs: ["a", 3] } })).toThrow(
        "artifacts.search_dirs must be a list of strings"
      );
      expect(() => parseConfig({ files: { dependencies: "package.json" } })).toThrow(
        "files.dependencies must be a list of strings"
      );
    });

    it("should reject an empty output path", () => {
      expect(() => parseConfig({ reporting: { output_path: " " } })).toThrow(
        "reporting.output_path must be a non-empty string"
      );
    });

    it("should carry the offending key", () => {
      let caught: unknown;
      try {
        parseConfig({ version: 3 });
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught).toMatchObject({ key: "version", message: "Unsupported config version 3" });
    });
  });

  describe("loadConfig", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "security-report-config-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("should return defaults when the file does not exist", () => {
      const config = loadConfig(path.join(tmpDir, CONFIG_FILE_NAME));
      expect(config.raw).toEqual({ version: 1 });
    });

    it("should read the file when present", () => {
      const file = path.join(tmpDir, CONFIG_FILE_NAME);
      fs.writeFileSync(file, "reporting:\n  output_path: out/report.json\n");

      expect(loadConfig(file).reporting.output_path).toBe("out/report.json");
    });
  });

  describe("categorize", () => {
    const config = createDefaultConfig();

    it("should classify authentication paths", () => {
      expect(config.categorize("src/auth/session.ts")).toEqual(["auth"]);
      expect(config.categorize("app/Login.kt")).toEqual(["auth"]);
    });

    it("should classify dependency manifests at any depth", () => {
      expect(config.categorize("package.json")).toEqual(["dependencies"]);
      expect(config.categorize("services/api/go.mod")).toEqual(["dependencies"]);
    });

    it("should classify infrastructure including dot directories", () => {
      expect(config.categorize(".github/workflows/ci.yml")).toEqual(["infrastructure"]);
      expect(config.categorize("deploy/main.tf")).toEqual(["infrastructure"]);
    });

    it("should place a file in several categories", () => {
      expect(config.categorize("src/auth/jwt.ts")).toEqual(["auth", "security"]);
    });

    it("should normalize Windows separators", () => {
      expect(config.isInCategory("src\\auth\\handler.ts", "auth")).toBe(true);
    });

    it("should leave ordinary files uncategorized", () => {
      expect(config.categorize("README.md")).toEqual([]);
    });
  });
});
