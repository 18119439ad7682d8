/**
 * Configuration schema (Zod)
 */

import { z } from "zod";
import { PRIMARY_RESOLV_CONF, REDIRECTED_RESOLV_CONF } from "../dns/resolv-conf.js";
import { FALLBACK_PATH_DIRS, SUBPROCESS_LOCALE } from "../system/search-path.js";

export const verbositySchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

export const logConfigSchema = z.object({
  prefix: z.string().default(""),
  verbosity: verbositySchema.default(0),
});

export const resolverConfigSchema = z.object({
  primaryPath: z.string().min(1).default(PRIMARY_RESOLV_CONF),
  /** Read instead of primaryPath when systemd-resolved is in effect */
  redirectedPath: z.string().min(1).default(REDIRECTED_RESOLV_CONF),
});

export const pathConfigSchema = z.object({
  fallbackDirs: z.array(z.string().min(1)).default([...FALLBACK_PATH_DIRS]),
  locale: z.string().min(1).default(SUBPROCESS_LOCALE),
});

export const configSchema = z.object({
  log: logConfigSchema.default({}),
  resolver: resolverConfigSchema.default({}),
  path: pathConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
