import { DEFAULT_PAIRING_THRESHOLD } from "./diff/aligner.js";

const env = (name: string, fallback: string): string => process.env[name] ?? fallback;

const numberFromEnv = (name: string, fallback: number): number => {
  const raw = env(name, "").trim();
  if (raw.length === 0) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  return parsed;
};

const integerFromEnv = (name: string, fallback: number, min: number): number => {
  const value = numberFromEnv(name, fallback);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer of at least ${min}, got "${value}"`);
  }
  return value;
};

/* At 0 unrelated sentences would pair; above 1 nothing could. */
const thresholdFromEnv = (name: string, fallback: number): number => {
  const value = numberFromEnv(name, fallback);
  if (value <= 0 || value > 1) {
    throw new Error(`${name} must be greater than 0 and at most 1, got "${value}"`);
  }
  return value;
};

export interface ParadiffConfig {
  port: number;
  /** Inputs longer than this are rejected before alignment. */
  maxInputChars: number;
  pairingThreshold: number;
  maxStoredComparisons: number;
}

export const loadConfig = (): ParadiffConfig => ({
  port: integerFromEnv("PARADIFF_PORT", 4177, 0),
  maxInputChars: integerFromEnv("PARADIFF_MAX_INPUT_CHARS", 2_000_000, 1),
  pairingThreshold: thresholdFromEnv("PARADIFF_PAIRING_THRESHOLD", DEFAULT_PAIRING_THRESHOLD),
  maxStoredComparisons: integerFromEnv("PARADIFF_MAX_STORED_COMPARISONS", 50, 1),
});
