/**
 * Generator Configuration
 *
 * Probabilities and amount range that drive the stream generator, with
 * defaults and a few scenario presets.
 */

import { Decimal } from "decimal.js";

// ============================================================================
// Config Types
// ============================================================================

export interface GeneratorConfig {
  /** Random seed for reproducibility; unseeded runs use Math.random */
  seed?: number;
  /** Chance that a step introduces a new client instead of reusing one */
  newClientProbability: number;
  /** Chance that a step's base transaction is disputed */
  disputeProbability: number;
  /** Chance per step of resolving one open dispute */
  resolveProbability: number;
  /** Chance per step of charging back one open dispute */
  chargebackProbability: number;
  /** Inclusive lower bound of base transaction amounts */
  amountMin: number;
  /** Exclusive upper bound of base transaction amounts */
  amountMax: number;
  /** Decimal places of generated amounts */
  amountDecimals: number;
}

export const DEFAULT_GENERATOR_CONFIG: Readonly<GeneratorConfig> = {
  newClientProbability: 0.75,
  disputeProbability: 0.1,
  resolveProbability: 0.1,
  chargebackProbability: 0.1,
  amountMin: 100,
  amountMax: 200,
  amountDecimals: 4,
};

export const MAX_AMOUNT_DECIMALS = 8;

export class ConfigError extends Error {
  readonly field: keyof GeneratorConfig;

  constructor(field: keyof GeneratorConfig, message: string) {
    super(`Invalid generator config "${field}": ${message}`);
    this.name = "ConfigError";
    this.field = field;
  }
}

// ============================================================================
// Validation
// ============================================================================

const PROBABILITY_FIELDS = [
  "newClientProbability",
  "disputeProbability",
  "resolveProbability",
  "chargebackProbability",
] as const;

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveGeneratorConfig(overrides: Partial<GeneratorConfig> = {}): GeneratorConfig {
  const config: GeneratorConfig = { ...DEFAULT_GENERATOR_CONFIG, ...overrides };

  if (config.seed !== undefined && !Number.isInteger(config.seed)) {
    throw new ConfigError("seed", `must be an integer, got ${config.seed}`);
  }

  for (const field of PROBABILITY_FIELDS) {
    const p = config[field];
    if (!Number.isFinite(p) || p < 0 || p > 1) {
      throw new ConfigError(field, `must be between 0 and 1, got ${p}`);
    }
  }

  if (!Number.isFinite(config.amountMin) || config.amountMin < 0) {
    throw new ConfigError("amountMin", `must be a non-negative number, got ${config.amountMin}`);
  }
  if (!Number.isFinite(config.amountMax) || config.amountMax <= config.amountMin) {
    throw new ConfigError("amountMax", `must be greater than amountMin (${config.amountMin}), got ${config.amountMax}`);
  }
  if (
    !Number.isInteger(config.amountDecimals) ||
    config.amountDecimals < 0 ||
    config.amountDecimals > MAX_AMOUNT_DECIMALS
  ) {
    throw new ConfigError(
      "amountDecimals",
      `must be an integer between 0 and ${MAX_AMOUNT_DECIMALS}, got ${config.amountDecimals}`
    );
  }

  const scale = new Decimal(10).pow(config.amountDecimals);
  const minUnits = new Decimal(config.amountMin).times(scale).ceil();
  const maxUnits = new Decimal(config.amountMax).times(scale).ceil();
  if (maxUnits.lte(minUnits)) {
    throw new ConfigError(
      "amountMax",
      `no amount with ${config.amountDecimals} decimals lies in [${config.amountMin}, ${config.amountMax})`
    );
  }
  if (maxUnits.gt(Number.MAX_SAFE_INTEGER)) {
    throw new ConfigError(
      "amountMax",
      `${config.amountMax} at ${config.amountDecimals} decimals exceeds the safe integer range of amount units`
    );
  }

  return config;
}

// ============================================================================
// Scenario Presets
// ============================================================================

export function createDefaultScenario(seed?: number): GeneratorConfig {
  return resolveGeneratorConfig({ seed });
}

/**
 * Many disputes, most of them closed again within a few steps
 */
export function createDisputeHeavyScenario(seed?: number): GeneratorConfig {
  return resolveGeneratorConfig({
    seed,
    disputeProbability: 0.4,
    resolveProbability: 0.3,
    chargebackProbability: 0.3,
  });
}

/**
 * Small client base with frequent repeat activity
 */
export function createFewClientsScenario(seed?: number): GeneratorConfig {
  return resolveGeneratorConfig({
    seed,
    newClientProbability: 0.1,
  });
}
