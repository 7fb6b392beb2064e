/**
 * Address resolution
 *
 * A URL's first path segment is either a bare database name or
 * `<name>-<hash prefix>`. Names may contain hyphens themselves, so the
 * split on the last hyphen is only trusted when the left side is a
 * registered name.
 */

import { NotFoundError } from '../errors.js';
import type { MetadataRegistry } from '../registry/registry.js';
import { HASH_PREFIX_LENGTH, type CanonicalAddress } from '../registry/types.js';

/**
 * Resource below the database that a request addresses.
 * Used to rebuild the same path under the current hash.
 */
export interface AddressContext {
  table?: string;
  /** Raw (already encoded) row key segment */
  rowKey?: string;
  /** Request asked for JSON via a `.json` suffix */
  json?: boolean;
}

export type Resolution =
  | { kind: 'canonical'; address: CanonicalAddress }
  | { kind: 'redirect'; address: CanonicalAddress; location: string };

/**
 * Split a name segment into a registered name and the hash it claims
 */
export function splitNameAndHash(
  registry: Pick<MetadataRegistry, 'has'>,
  dbName: string
): { name: string; claimedHash: string | null } {
  const idx = dbName.lastIndexOf('-');
  if (idx !== -1) {
    const candidate = dbName.slice(0, idx);
    if (registry.has(candidate)) {
      return { name: candidate, claimedHash: dbName.slice(idx + 1) };
    }
  }
  return { name: dbName, claimedHash: null };
}

/**
 * Build the path of a resource under its canonical address
 */
export function canonicalPath(address: CanonicalAddress, context: AddressContext = {}): string {
  let path = `/${encodeURIComponent(`${address.name}-${address.hashPrefix}`)}`;
  if (context.table !== undefined) {
    path += `/${encodeURIComponent(context.table)}`;
    if (context.rowKey !== undefined) {
      path += `/${context.rowKey}`;
    }
  }
  if (context.json) {
    path += '.json';
  }
  return path;
}

/**
 * Resolve a URL name segment against the registry.
 *
 * Returns the canonical address when the segment carries the current hash
 * prefix, otherwise a redirect to the same resource under that prefix.
 * @throws NotFoundError when no registered name matches
 */
export function resolveAddress(
  registry: Pick<MetadataRegistry, 'has' | 'lookup'>,
  dbName: string,
  context: AddressContext = {}
): Resolution {
  const { name, claimedHash } = splitNameAndHash(registry, dbName);
  if (!registry.has(name)) {
    throw new NotFoundError(`Database not found: ${name}`);
  }

  const record = registry.lookup(name);
  const address: CanonicalAddress = {
    name,
    hashPrefix: record.digest.slice(0, HASH_PREFIX_LENGTH),
  };

  if (claimedHash !== address.hashPrefix) {
    return { kind: 'redirect', address, location: canonicalPath(address, context) };
  }
  return { kind: 'canonical', address };
}
