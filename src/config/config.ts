// src/config/config.ts
// Configuration for converter builds

import * as fs from "fs";
import * as path from "path";
import { ConversionError } from "../outcome/errors";
import { invalidConfig } from "../outcome/constructors";

// =========================================================================
// Configuration Types
// =========================================================================

/** What a variant converter does with a source tag it has no constructor for */
export type UnknownTagPolicy = "fail" | "ignore";

export type ConvertConfig = {
  /** Byte order of both source and destination memory */
  littleEndian: boolean;
  /** Check source and destination ranges once per top-level apply */
  boundsCheck: boolean;
  /** "fail" throws unknown-tag; "ignore" leaves the destination untouched */
  unknownTag: UnknownTagPolicy;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: ConvertConfig = {
  littleEndian: true,
  boundsCheck: true,
  unknownTag: "fail",
};

const UNKNOWN_TAG_POLICIES: readonly UnknownTagPolicy[] = ["fail", "ignore"];

// =========================================================================
// Configuration Loading
// =========================================================================

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  throw new ConversionError(invalidConfig(`expected a boolean, got '${raw}'`));
}

function parsePolicy(raw: unknown, fallback: UnknownTagPolicy): UnknownTagPolicy {
  if (raw === undefined || raw === "") return fallback;
  const found = UNKNOWN_TAG_POLICIES.find((p) => p === raw);
  if (!found) {
    throw new ConversionError(invalidConfig(`unknownTag must be one of ${UNKNOWN_TAG_POLICIES.join(", ")}, got '${String(raw)}'`));
  }
  return found;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "STRUCTCONV", env: NodeJS.ProcessEnv = process.env): ConvertConfig {
  return {
    littleEndian: parseBool(env[`${prefix}_LITTLE_ENDIAN`], DEFAULT_CONFIG.littleEndian),
    boundsCheck: parseBool(env[`${prefix}_BOUNDS_CHECK`], DEFAULT_CONFIG.boundsCheck),
    unknownTag: parsePolicy(env[`${prefix}_UNKNOWN_TAG`], DEFAULT_CONFIG.unknownTag),
  };
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): ConvertConfig {
  const pick = (camel: string, snake: string): unknown => data[camel] ?? data[snake];
  const bool = (value: unknown, fallback: boolean): boolean => {
    if (value === undefined) return fallback;
    if (typeof value === "boolean") return value;
    throw new ConversionError(invalidConfig(`expected a boolean, got ${JSON.stringify(value)}`));
  };

  return {
    littleEndian: bool(pick("littleEndian", "little_endian"), DEFAULT_CONFIG.littleEndian),
    boundsCheck: bool(pick("boundsCheck", "bounds_check"), DEFAULT_CONFIG.boundsCheck),
    unknownTag: parsePolicy(pick("unknownTag", "unknown_tag"), DEFAULT_CONFIG.unknownTag),
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): ConvertConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConversionError(invalidConfig(`config file not found: ${filePath}`));
  }
  if (path.extname(filePath).toLowerCase() !== ".json") {
    throw new ConversionError(invalidConfig(`unsupported config file format: ${path.extname(filePath)}`));
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConversionError(invalidConfig(`${filePath} is not JSON (${e instanceof Error ? e.message : String(e)})`));
  }
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new ConversionError(invalidConfig(`${filePath} must hold a JSON object`));
  }
  return configFromObject({ ...data });
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<ConvertConfig>[]): ConvertConfig {
  let result = { ...DEFAULT_CONFIG };
  for (const cfg of configs) {
    result = {
      littleEndian: cfg.littleEndian ?? result.littleEndian,
      boundsCheck: cfg.boundsCheck ?? result.boundsCheck,
      unknownTag: cfg.unknownTag ?? result.unknownTag,
    };
  }
  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: Partial<ConvertConfig>;
}): ConvertConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else if (fs.existsSync("structconv.config.json")) {
    config = mergeConfigs(config, configFromFile("structconv.config.json"));
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
};

export function validateConfig(config: ConvertConfig): ConfigValidation {
  const errors: string[] = [];
  if (typeof config.littleEndian !== "boolean") errors.push("littleEndian must be a boolean");
  if (typeof config.boundsCheck !== "boolean") errors.push("boundsCheck must be a boolean");
  if (!UNKNOWN_TAG_POLICIES.includes(config.unknownTag)) {
    errors.push(`unknownTag must be one of ${UNKNOWN_TAG_POLICIES.join(", ")}`);
  }
  return { valid: errors.length === 0, errors };
}
