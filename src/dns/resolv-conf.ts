/**
 * Nameserver discovery from resolv.conf-style files.
 */

import { readFileSync } from "node:fs";
import { isErrnoException } from "../errors.js";
import { familyIpTuple, type NameServerEntry } from "../net/address.js";
import type { DiagnosticLogger } from "../utils/logger.js";

export const PRIMARY_RESOLV_CONF = "/etc/resolv.conf";
/** Upstream servers maintained by systemd-resolved */
export const REDIRECTED_RESOLV_CONF = "/run/systemd/resolve/resolv.conf";

export interface ResolverContext {
  logger: DiagnosticLogger;
  primaryPath?: string;
  redirectedPath?: string;
}

export type ReadConfigResult =
  | { success: true; data: string }
  | { success: false; error: { code: string; message: string } };

/** Errors meaning "this file is not there for us"; everything else is real. */
const ABSENT_CODES = new Set(["ENOENT", "ENOTDIR", "EACCES", "EPERM"]);

/**
 * Read a configuration file, reporting an absent or unreadable file as a
 * failed result. Other I/O errors are thrown.
 */
export function readConfigFile(path: string): ReadConfigResult {
  try {
    return { success: true, data: readFileSync(path, "utf-8") };
  } catch (err) {
    if (isErrnoException(err) && err.code !== undefined && ABSENT_CODES.has(err.code)) {
      return { success: false, error: { code: err.code, message: err.message } };
    }
    throw err;
  }
}

export function parseResolvConf(text: string): NameServerEntry[] {
  const entries: NameServerEntry[] = [];
  for (const line of text.split("\n")) {
    const words = line.toLowerCase().trim().split(/\s+/);
    if (words.length >= 2 && words[0] === "nameserver") {
      entries.push(familyIpTuple(words[1]));
    }
  }
  return entries;
}

/**
 * Files to probe. With systemd-resolved active, /etc/resolv.conf points at the
 * local stub, so only the redirected file is read.
 */
export function resolvConfFiles(
  redirectionAware: boolean,
  ctx: Pick<ResolverContext, "primaryPath" | "redirectedPath"> = {}
): string[] {
  if (redirectionAware) {
    return [ctx.redirectedPath ?? REDIRECTED_RESOLV_CONF];
  }
  return [ctx.primaryPath ?? PRIMARY_RESOLV_CONF];
}

/**
 * List the nameservers the host is configured to use, in file order then
 * line order.
 */
export function discoverNameservers(
  redirectionAware: boolean,
  ctx: ResolverContext
): NameServerEntry[] {
  const nameservers: NameServerEntry[] = [];
  for (const file of resolvConfFiles(redirectionAware, ctx)) {
    const read = readConfigFile(file);
    if (!read.success) {
      ctx.logger.debug3(
        `Failed to read ${file} when looking for DNS servers: ${read.error.message}`
      );
      continue;
    }
    const found = parseResolvConf(read.data);
    ctx.logger.debug2(
      `Found DNS servers in ${file}: ${JSON.stringify(found.map((n) => n.address))}`
    );
    nameservers.push(...found);
  }
  return nameservers;
}
