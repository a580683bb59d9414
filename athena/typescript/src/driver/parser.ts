/**
 * Athena Result Parser
 *
 * Athena returns every cell as a string (`VarCharValue`). These helpers turn
 * the strings into JS values according to the column's engine type.
 *
 * @module athena-catalog/driver/parser
 */

import type { ColumnInfo as AthenaColumnInfo, Datum, Row as AthenaRow } from '@aws-sdk/client-athena';
import type { ColumnDescription, JsonValue, Row, Value } from '../types/index.js';

// ============================================================================
// Value Parsing Functions
// ============================================================================

/**
 * Parses a boolean value.
 */
export function parseBoolean(value: string): boolean {
  const lower = value.toLowerCase();
  return lower === 'true' || lower === 't' || lower === '1';
}

/**
 * Parses an integer or floating point value. Unparseable text is returned
 * unchanged.
 */
export function parseNumber(value: string): number | string {
  const parsed = Number(value);
  return Number.isNaN(parsed) && value !== 'NaN' ? value : parsed;
}

/**
 * Parses a bigint value.
 */
export function parseBigInt(value: string): bigint | string {
  try {
    return BigInt(value);
  } catch {
    return value;
  }
}

/**
 * Parses a JSON value. Invalid JSON is returned as the raw string.
 */
export function parseJson(value: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(value);
    return parsed;
  } catch {
    return value;
  }
}

/**
 * Parses a varbinary value. Athena renders bytes as space separated hex pairs.
 */
export function parseBinary(value: string): Uint8Array | string {
  const hex = value.replace(/\s+/g, '');
  if (hex.length % 2 !== 0 || /[^0-9a-f]/i.test(hex)) {
    return value;
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = parseInt(hex.slice(i, i + 2), 16);
  }
  return bytes;
}

/**
 * Parses a value based on its Athena data type.
 */
export function parseValue(rawValue: string | undefined, typeName: string): Value {
  // Athena omits VarCharValue for NULL
  if (rawValue === undefined) {
    return null;
  }

  const normalizedType = typeName.split('(')[0].trim().toLowerCase();

  switch (normalizedType) {
    case 'boolean':
      return parseBoolean(rawValue);
    case 'bigint':
      return parseBigInt(rawValue);
    case 'tinyint':
    case 'smallint':
    case 'integer':
    case 'int':
    case 'float':
    case 'real':
    case 'double':
      return parseNumber(rawValue);
    case 'json':
      return parseJson(rawValue);
    case 'varbinary':
      return parseBinary(rawValue);
    default:
      // decimal keeps its exact text; dates, timestamps and nested types
      // are rendered by the engine already
      return rawValue;
  }
}

// ============================================================================
// Row and Metadata Conversion
// ============================================================================

/**
 * Converts Athena column info into column descriptions. Returns `null` when
 * the statement produced no columns.
 */
export function toColumnDescriptions(
  columnInfo: readonly AthenaColumnInfo[] | undefined
): ColumnDescription[] | null {
  if (!columnInfo || columnInfo.length === 0) {
    return null;
  }
  return columnInfo.map((column) => ({
    name: column.Name ?? column.Label ?? '',
    typeName: column.Type ?? 'varchar',
  }));
}

/**
 * Converts one Athena row into a positional row.
 */
export function toRow(row: AthenaRow, columns: readonly ColumnDescription[]): Row {
  const data: Datum[] = row.Data ?? [];
  return columns.map((column, index) => parseValue(data[index]?.VarCharValue, column.typeName));
}

/**
 * Checks whether an Athena row repeats the column names, which is how the
 * first page of a SELECT result starts.
 */
export function isHeaderRow(row: AthenaRow, columns: readonly ColumnDescription[]): boolean {
  const data = row.Data ?? [];
  if (data.length !== columns.length) {
    return false;
  }
  return columns.every((column, index) => data[index]?.VarCharValue === column.name);
}
