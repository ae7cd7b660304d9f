// IPv4 address resolution.

import { lookup } from "node:dns/promises";
import { ConfigurationError } from "./errors.ts";

/** One result of a host lookup. */
export interface AddressCandidate {
  address: string;
  family: number;
}

/** Host lookup returning every address in resolver order. */
export type Lookup = (hostname: string) => Promise<AddressCandidate[]>;

export const dnsLookup: Lookup = (hostname) => lookup(hostname, { all: true, verbatim: true });

/**
 * Pick the IPv4 address to connect to.
 *
 * The first IPv4 candidate is chosen, except that a later IPv4 candidate
 * spelled exactly like `requested` replaces it.
 */
export function selectIPv4(
  requested: string,
  candidates: readonly AddressCandidate[],
): string | null {
  let selected: string | null = null;

  for (const candidate of candidates) {
    if (candidate.family !== 4) continue;

    if (selected === null) {
      selected = candidate.address;
    } else if (candidate.address === requested) {
      selected = candidate.address;
    }
  }

  return selected;
}

/**
 * Resolve `address` to an IPv4 address.
 *
 * @throws ConfigurationError with kind "resolve" when the lookup fails or
 * yields no IPv4 address.
 */
export async function resolveIPv4(address: string, lookupFn: Lookup = dnsLookup): Promise<string> {
  let candidates: AddressCandidate[];
  try {
    candidates = await lookupFn(address);
  } catch (error) {
    throw ConfigurationError.resolve(address, error);
  }

  const selected = selectIPv4(address, candidates);
  if (selected === null) {
    throw ConfigurationError.resolve(address);
  }
  return selected;
}
