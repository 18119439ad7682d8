/**
 * Config loader with environment variable expansion
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { ZodError } from "zod";
import { FatalError, isErrnoException } from "../errors.js";
import { configSchema, type Config } from "./schema.js";
import { expandEnvVarsDeep, type EnvLookup } from "./expand-env.js";

export const VERBOSITY_ENV = "HOSTPROBE_VERBOSITY";
export const LOG_PREFIX_ENV = "HOSTPROBE_LOG_PREFIX";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** HOSTPROBE_* variables win over file values. */
function applyEnvOverrides(raw: unknown, env: EnvLookup): unknown {
  const verbosity = env[VERBOSITY_ENV];
  const prefix = env[LOG_PREFIX_ENV];
  if (verbosity === undefined && prefix === undefined) return raw;
  if (!isRecord(raw)) return raw;

  const log: Record<string, unknown> = isRecord(raw.log) ? { ...raw.log } : {};
  if (verbosity !== undefined && verbosity !== "") log.verbosity = Number(verbosity);
  if (prefix !== undefined) log.prefix = prefix;
  return { ...raw, log };
}

function formatZodError(error: ZodError): string {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return `Config validation failed:\n${lines.join("\n")}`;
}

export function parseConfig(raw: unknown, env: EnvLookup = process.env): Config {
  const expanded = applyEnvOverrides(expandEnvVarsDeep(raw ?? {}, env), env);
  try {
    return configSchema.parse(expanded);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new FatalError(formatZodError(err), err.errors);
    }
    throw err;
  }
}

/**
 * Load configuration from a YAML file. Without a path the schema defaults
 * apply (plus environment overrides).
 */
export async function loadConfig(path?: string, env: EnvLookup = process.env): Promise<Config> {
  if (path === undefined) {
    return parseConfig({}, env);
  }

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new FatalError(`Config file not found: ${path}`);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (err) {
    throw new FatalError(`Config file is not valid YAML: ${path}`, err);
  }
  return parseConfig(raw, env);
}
