import { delimiter } from "node:path";

/** Search path used when nothing else is configured (confstr _CS_PATH). */
export const DEFAULT_PATH_DIRS: readonly string[] = ["/bin", "/usr/bin"];

/**
 * Admin binaries are often missing from a user's PATH, yet privileged
 * helpers (iptables, nft, pfctl) live there.
 */
export const FALLBACK_PATH_DIRS: readonly string[] = ["/bin", "/usr/bin", "/sbin", "/usr/sbin"];

export const SUBPROCESS_LOCALE = "C";

export interface SearchPathOptions {
  env?: NodeJS.ProcessEnv;
  fallbackDirs?: readonly string[];
}

export interface SubprocessEnvOptions extends SearchPathOptions {
  locale?: string;
}

export interface SubprocessEnv {
  PATH: string;
  LC_ALL: string;
}

/**
 * Inherited PATH, then the default path, then the fallback directories,
 * keeping the first occurrence of each.
 *
 * Empty PATH segments are dropped; they do not stand for the current directory.
 */
export function buildSearchPath(opts: SearchPathOptions = {}): string[] {
  const env = opts.env ?? process.env;
  const dirs: string[] = [];
  if (env.PATH !== undefined) {
    dirs.push(...env.PATH.split(delimiter).filter((d) => d.length > 0));
  }
  dirs.push(...DEFAULT_PATH_DIRS);
  dirs.push(...(opts.fallbackDirs ?? FALLBACK_PATH_DIRS));
  return [...new Set(dirs)];
}

export function getPath(opts: SearchPathOptions = {}): string {
  return buildSearchPath(opts).join(delimiter);
}

/**
 * Environment for helper subprocesses. `which()` searches the same PATH, so
 * anything it finds is also found at run time.
 */
export function buildSubprocessEnv(opts: SubprocessEnvOptions = {}): SubprocessEnv {
  return {
    PATH: getPath(opts),
    LC_ALL: opts.locale ?? SUBPROCESS_LOCALE,
  };
}
