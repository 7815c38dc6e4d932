import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";

import { InvalidArgumentError } from "@floatcmp/core";
import YAML from "yaml";

import { DEFAULT_TOLERANCE, epsilonTolerance, isPrecision } from "../epsilon.js";
import { ConfigError } from "../util/errors.js";
import { KNOWN_PROFILE_KEYS, type ToleranceConfig, type ToleranceProfile } from "./types.js";

export const DEFAULT_CONFIG_PATH = "floatcmp.yml";

/** Used when no configuration file is loaded. */
export const DEFAULT_TOLERANCE_CONFIG: ToleranceConfig = {
  schemaVersion: 1,
  defaultProfile: "strict",
  profiles: {
    strict: { abs: DEFAULT_TOLERANCE, rel: 0 },
    absolute: { abs: 1e-10, rel: 0 },
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const knownProfileKeys = new Set<string>(KNOWN_PROFILE_KEYS);

function readTolerance(name: string, key: string, value: unknown): number {
  if (typeof value !== "number" || Number.isNaN(value) || value < 0) {
    throw new ConfigError(`profiles.${name}.${key} must be a non-negative number`);
  }
  return value;
}

function assertProfile(name: string, value: unknown, stderr: NodeJS.WritableStream): ToleranceProfile {
  if (!isRecord(value)) {
    throw new ConfigError(`profiles.${name} must be an object`);
  }

  const unknownKeys = Object.keys(value).filter((k) => !knownProfileKeys.has(k));
  if (unknownKeys.length > 0) {
    stderr.write(`warning: unknown key(s) in profile ${name}: ${unknownKeys.sort().join(", ")} (ignoring)\n`);
  }

  if (value.abs !== undefined && value.epsilonMultiple !== undefined) {
    throw new ConfigError(`profiles.${name} sets both abs and epsilonMultiple`);
  }

  const precision = value.precision ?? "float64";
  if (!isPrecision(precision)) {
    throw new ConfigError(`profiles.${name}.precision must be one of: float64, float32`);
  }
  if (value.precision !== undefined && value.epsilonMultiple === undefined) {
    throw new ConfigError(`profiles.${name}.precision requires epsilonMultiple`);
  }

  let abs = DEFAULT_TOLERANCE;
  if (value.abs !== undefined) {
    abs = readTolerance(name, "abs", value.abs);
  } else if (value.epsilonMultiple !== undefined) {
    const multiple = readTolerance(name, "epsilonMultiple", value.epsilonMultiple);
    if (!Number.isFinite(multiple)) {
      throw new ConfigError(`profiles.${name}.epsilonMultiple must be finite`);
    }
    abs = epsilonTolerance(multiple, precision);
  }

  const rel = value.rel === undefined ? 0 : readTolerance(name, "rel", value.rel);

  return { abs, rel };
}

/**
 * Validate a parsed configuration document. Exposed separately from
 * {@link loadToleranceConfig} so callers can supply configuration from memory.
 */
export function parseToleranceConfig(
  parsed: unknown,
  opts: { stderr?: NodeJS.WritableStream } = {},
): ToleranceConfig {
  const stderr = opts.stderr ?? process.stderr;

  if (!isRecord(parsed)) {
    throw new ConfigError("config root must be an object");
  }

  const schemaVersion = parsed.schemaVersion;
  if (schemaVersion !== 1) {
    throw new ConfigError(`schemaVersion must be 1 (got ${String(schemaVersion)})`);
  }

  const profilesRaw = parsed.profiles;
  if (!isRecord(profilesRaw)) {
    throw new ConfigError("profiles must be an object");
  }

  const names = Object.keys(profilesRaw).sort();
  if (names.length === 0) {
    throw new ConfigError("profiles must define at least one profile");
  }

  const profiles: Record<string, ToleranceProfile> = {};
  for (const name of names) {
    profiles[name] = assertProfile(name, profilesRaw[name], stderr);
  }

  let defaultProfile = parsed.defaultProfile;
  if (defaultProfile === undefined) {
    if (names.length !== 1) {
      throw new ConfigError("defaultProfile is required when more than one profile is defined");
    }
    defaultProfile = names[0];
  }

  if (typeof defaultProfile !== "string" || !(defaultProfile in profiles)) {
    throw new ConfigError(
      `defaultProfile must name a defined profile (got ${String(defaultProfile)}; known: ${names.join(", ")})`,
    );
  }

  return { schemaVersion: 1, defaultProfile, profiles };
}

export interface LoadToleranceConfigOptions {
  rootDir: string;
  configPath?: string;
  stderr?: NodeJS.WritableStream;
}

export async function loadToleranceConfig(
  opts: LoadToleranceConfigOptions,
): Promise<{ configPath: string; config: ToleranceConfig }> {
  const configPath = opts.configPath ?? DEFAULT_CONFIG_PATH;
  const absPath = path.resolve(opts.rootDir, configPath);

  let raw: string;
  try {
    raw = await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;

    if (code === "ENOENT") {
      throw new ConfigError(`config not found: ${configPath}`);
    }

    if (code === "EACCES" || code === "EPERM") {
      throw new ConfigError(`cannot read config (permission denied): ${configPath}`);
    }

    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to read config ${configPath}: ${msg}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`invalid YAML in ${configPath}: ${msg}`);
  }

  const config = parseToleranceConfig(parsed, opts.stderr ? { stderr: opts.stderr } : {});

  return { configPath, config };
}

/**
 * Look up a profile by name, falling back to `config.defaultProfile`.
 */
export function resolveProfile(config: ToleranceConfig, name?: string): ToleranceProfile {
  const key = name ?? config.defaultProfile;
  const profile = config.profiles[key];
  if (!profile) {
    const known = Object.keys(config.profiles).sort().join(", ");
    throw new InvalidArgumentError(`unknown tolerance profile: ${key} (known: ${known})`);
  }
  return profile;
}
