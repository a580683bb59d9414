/**
 * Maps Athena type names to the short glyphs shown next to columns.
 * @module athena-catalog/types/short-type
 */

export const SHORT_TYPES: Readonly<Record<string, string>> = {
  array: '[]',
  bigint: '##',
  boolean: 't/f',
  char: 't',
  date: 'd',
  decimal: '#.#',
  double: '#.#',
  float: '#.#',
  integer: '#',
  interval: '|-|',
  json: '{}',
  map: '{}',
  real: '#.#',
  row: '{}',
  smallint: '#',
  string: 't',
  struct: '{}',
  time: 't',
  timestamp: 'ts',
  tinyint: '#',
  varbinary: 'b',
  varchar: 't',
};

export const UNKNOWN_TYPE_GLYPH = '?';

/**
 * Returns the glyph for an engine type name. Parameters and qualifiers are
 * ignored, so `varchar(255)` and `timestamp with time zone` resolve like
 * `varchar` and `timestamp`.
 */
export function shortType(typeName: string): string {
  const base = typeName.trim().split('(')[0].split(' ')[0].toLowerCase();
  return Object.prototype.hasOwnProperty.call(SHORT_TYPES, base)
    ? SHORT_TYPES[base]
    : UNKNOWN_TYPE_GLYPH;
}
