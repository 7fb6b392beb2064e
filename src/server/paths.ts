/**
 * Request path parsing
 *
 * Segments are taken from the raw (still percent-encoded) pathname: the
 * row key segment must reach the compound key codec undecoded, otherwise
 * an encoded comma inside a value would turn into a separator.
 */

const JSON_SUFFIX = '.json';

export interface RequestPath {
  /** Database name segment, possibly `<name>-<hash>` */
  dbName: string;
  table?: string;
  /** Encoded row key segment */
  rowKey?: string;
  /** `.json` suffix present on the last segment */
  json: boolean;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Split `/<db>[/<table>[/<key>]][.json]` into its parts
 */
export function parseRequestPath(pathname: string): RequestPath {
  const segments = pathname.replace(/^\/+/, '').split('/');

  let json = false;
  const last = segments.length - 1;
  if (segments[last].endsWith(JSON_SUFFIX) && segments[last].length > JSON_SUFFIX.length) {
    segments[last] = segments[last].slice(0, -JSON_SUFFIX.length);
    json = true;
  }

  const [db, table, rowKey] = segments;
  return {
    dbName: decodeSegment(db),
    table: table !== undefined ? decodeSegment(table) : undefined,
    rowKey,
    json,
  };
}
