import { AddressFamily, type NameServerEntry } from "../net/address.js";
import { discoverNameservers, type ResolverContext } from "./resolv-conf.js";

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export interface SelectContext extends ResolverContext {
  random?: RandomSource;
}

export const FALLBACK_NAMESERVER: NameServerEntry = Object.freeze({
  family: AddressFamily.IPv4,
  address: "127.0.0.1",
});

/** Fisher-Yates shuffle, in place. */
export function shuffle<T>(items: T[], random: RandomSource = Math.random): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

/**
 * Pick one nameserver. Several candidates are shuffled so repeated runs
 * spread load across them; none at all yields 127.0.0.1.
 */
export function selectNameserver(redirectionAware: boolean, ctx: SelectContext): NameServerEntry {
  const candidates = discoverNameservers(redirectionAware, ctx);
  if (candidates.length > 1) {
    shuffle(candidates, ctx.random);
  }
  return candidates[0] ?? FALLBACK_NAMESERVER;
}
