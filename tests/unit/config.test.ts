import { describe, it, expect } from "vitest";

import {
  DEFAULT_DATABASE_URL,
  loadConfig,
  requireSetting,
} from "../../src/config.js";
import { ConfigurationError } from "../../src/errors.js";

describe("config", () => {
  describe("loadConfig", () => {
    it("should fall back to defaults for an empty environment", () => {
      const config = loadConfig({});

      expect(config.databaseUrl).toBe(DEFAULT_DATABASE_URL);
      expect(config.congressApi.apiKey).toBeNull();
      expect(config.currentCongress).toBe(119);
      expect(config.congresses).toEqual([119]);
      expect(config.jobTimeoutMs).toBe(120 * 60_000);
      expect(config.voteScanMisses).toBe(3);
      expect(config.embeddings.tiers).toEqual([32_000, 20_000, 10_000]);
      expect(config.embeddings.apiKey).toBeNull();
      expect(config.lookbackDays).toEqual({});
    });

    it("should parse lists and numbers", () => {
      const config = loadConfig({
        SYNC_CONGRESSES: "118, 119",
        CURRENT_CONGRESS: "119",
        NETWORK_RETRY_DELAYS_MS: "10,20",
        JOB_TIMEOUT_MINUTES: "5",
        LOOKBACK_DAYS_VOTES: "14",
        EMBEDDING_TIERS: "8000,4000",
      });

      expect(config.congresses).toEqual([118, 119]);
      expect(config.fetchPolicy.networkRetryDelaysMs).toEqual([10, 20]);
      expect(config.jobTimeoutMs).toBe(300_000);
      expect(config.lookbackDays).toEqual({ votes: 14 });
      expect(config.embeddings.tiers).toEqual([8000, 4000]);
    });

    it("should treat a blank credential as missing", () => {
      const config = loadConfig({ CONGRESS_API_KEY: "   " });
      expect(config.congressApi.apiKey).toBeNull();
    });

    it("should name the offending variable", () => {
      expect(() => loadConfig({ PAGE_SIZE: "many" })).toThrow(
        /^Invalid PAGE_SIZE:/
      );
    });

    it("should reject an odd election cycle", () => {
      expect(() => loadConfig({ FEC_CYCLE: "2025" })).toThrow(
        new ConfigurationError(
          "FEC_CYCLE must be an even election year, got 2025"
        )
      );
    });

    it("should reject a zero embedding tier", () => {
      expect(() => loadConfig({ EMBEDDING_TIERS: "1000,0" })).toThrow(
        "EMBEDDING_TIERS must be positive"
      );
    });
  });

  describe("requireSetting", () => {
    it("should return a configured value", () => {
      expect(requireSetting("test-key", "CONGRESS_API_KEY")).toBe("test-key");
    });

    it("should throw ConfigurationError for a missing value", () => {
      expect(() => requireSetting(null, "OPENAI_API_KEY")).toThrow(
        ConfigurationError
      );
    });
  });
});
