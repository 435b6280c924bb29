import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/core/config.js";

describe("loadConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  const stubBlank = (): void => {
    vi.stubEnv("PARADIFF_PORT", "");
    vi.stubEnv("PARADIFF_MAX_INPUT_CHARS", "");
    vi.stubEnv("PARADIFF_PAIRING_THRESHOLD", "");
    vi.stubEnv("PARADIFF_MAX_STORED_COMPARISONS", "");
  };

  it("falls back to defaults when variables are unset or blank", () => {
    stubBlank();
    expect(loadConfig()).toEqual({
      port: 4177,
      maxInputChars: 2_000_000,
      pairingThreshold: 0.5,
      maxStoredComparisons: 50,
    });
  });

  it("reads numeric overrides", () => {
    vi.stubEnv("PARADIFF_PORT", "5000");
    vi.stubEnv("PARADIFF_MAX_INPUT_CHARS", "1234");
    vi.stubEnv("PARADIFF_PAIRING_THRESHOLD", "0.75");
    vi.stubEnv("PARADIFF_MAX_STORED_COMPARISONS", "3");
    expect(loadConfig()).toEqual({ port: 5000, maxInputChars: 1234, pairingThreshold: 0.75, maxStoredComparisons: 3 });
  });

  it("rejects values that are not non-negative numbers", () => {
    stubBlank();
    vi.stubEnv("PARADIFF_PORT", "abc");
    expect(() => loadConfig()).toThrow('PARADIFF_PORT must be a non-negative number, got "abc"');
  });

  it("accepts a pairing threshold of exactly 1", () => {
    stubBlank();
    vi.stubEnv("PARADIFF_PAIRING_THRESHOLD", "1");
    expect(loadConfig().pairingThreshold).toBe(1);
  });

  it("rejects pairing thresholds outside (0, 1]", () => {
    stubBlank();
    vi.stubEnv("PARADIFF_PAIRING_THRESHOLD", "0");
    expect(() => loadConfig()).toThrow('PARADIFF_PAIRING_THRESHOLD must be greater than 0 and at most 1, got "0"');
    vi.stubEnv("PARADIFF_PAIRING_THRESHOLD", "1.5");
    expect(() => loadConfig()).toThrow('PARADIFF_PAIRING_THRESHOLD must be greater than 0 and at most 1, got "1.5"');
  });

  it("rejects a comparison store smaller than one entry", () => {
    stubBlank();
    vi.stubEnv("PARADIFF_MAX_STORED_COMPARISONS", "0");
    expect(() => loadConfig()).toThrow('PARADIFF_MAX_STORED_COMPARISONS must be an integer of at least 1, got "0"');
  });
});
