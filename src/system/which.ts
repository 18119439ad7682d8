import { accessSync, constants, statSync } from "node:fs";
import { delimiter, join, sep } from "node:path";
import { isErrnoException } from "../errors.js";
import type { DiagnosticLogger } from "../utils/logger.js";
import { buildSearchPath, type SearchPathOptions } from "./search-path.js";

export interface WhichContext extends SearchPathOptions {
  logger: DiagnosticLogger;
  /** fs.access mode a match must satisfy (default F_OK | X_OK) */
  mode?: number;
}

function isUsable(candidate: string, mode: number): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    accessSync(candidate, mode);
    return true;
  } catch (err) {
    if (isErrnoException(err)) return false;
    throw err;
  }
}

/**
 * Resolve a program name against the search path from `buildSearchPath()`.
 * Returns null when nothing usable is found.
 */
export function which(name: string, ctx: WhichContext): string | null {
  const mode = ctx.mode ?? constants.F_OK | constants.X_OK;
  const dirs = buildSearchPath(ctx);

  let found: string | null = null;
  if (name.includes(sep) || name.includes("/")) {
    found = isUsable(name, mode) ? name : null;
  } else {
    for (const dir of dirs) {
      const candidate = join(dir, name);
      if (isUsable(candidate, mode)) {
        found = candidate;
        break;
      }
    }
  }

  if (found !== null) {
    ctx.logger.debug2(`which() found '${name}' at ${found}`);
  } else {
    ctx.logger.debug2(`which() could not find '${name}' in ${dirs.join(delimiter)}`);
  }
  return found;
}
