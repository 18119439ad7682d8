export const AddressFamily = {
  IPv4: 4,
  IPv6: 6,
} as const;

export type AddressFamily = (typeof AddressFamily)[keyof typeof AddressFamily];

export interface NameServerEntry {
  readonly family: AddressFamily;
  readonly address: string;
}

/**
 * Pair an address with its family. Anything containing a colon is IPv6;
 * the text itself is not validated.
 */
export function familyIpTuple(ip: string): NameServerEntry {
  return { family: ip.includes(":") ? AddressFamily.IPv6 : AddressFamily.IPv4, address: ip };
}

export function familyToString(family: number): string {
  if (family === AddressFamily.IPv6) return "IPv6";
  if (family === AddressFamily.IPv4) return "IPv4";
  return String(family);
}
