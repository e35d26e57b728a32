/**
 * Record access and column resolution
 *
 * Records are ordered maps: a `Map` in insertion order, or a plain object in
 * its own key order.
 */

import type { RecordValue, TableRecord } from './types';

/**
 * Fields starting with this prefix carry HTML attributes, never display data.
 * @deprecated Use cell formatting rules instead
 */
export const LEGACY_ATTRIBUTE_PREFIX = 'attr_';

/**
 * Separates the attribute name from its target column: `attr_title__name`
 */
export const LEGACY_ATTRIBUTE_SEPARATOR = '__';

export interface LegacyAttribute {
  name: string;
  value: RecordValue | undefined;
}

function isMapRecord(record: TableRecord): record is ReadonlyMap<string, RecordValue> {
  return record instanceof Map;
}

/**
 * Field names of a record in natural order
 */
export function fieldNames(record: TableRecord): string[] {
  return isMapRecord(record) ? [...record.keys()] : Object.keys(record);
}

/**
 * Look up a field; absent fields yield undefined
 */
export function fieldValue(record: TableRecord, name: string): RecordValue | undefined {
  if (isMapRecord(record)) {
    return record.get(name);
  }
  return Object.hasOwn(record, name) ? record[name] : undefined;
}

export function isReservedField(name: string): boolean {
  return name.startsWith(LEGACY_ATTRIBUTE_PREFIX);
}

/**
 * Resolve the display columns from the first record
 *
 * With `requested`, keeps the requested names present on the record, in
 * requested order (each name once). Reserved-prefix fields are always dropped.
 */
export function resolveColumns(
  firstRecord: TableRecord,
  requested?: readonly string[]
): string[] {
  const available = fieldNames(firstRecord);
  const names = requested
    ? [...new Set(requested)].filter(name => available.includes(name))
    : available;

  return names.filter(name => !isReservedField(name));
}

/**
 * Collect the legacy attributes a record carries for one column's cell
 *
 * `attr_<name>__<column>` targets a single column; `attr_<name>` targets
 * every cell in the row.
 */
export function legacyAttributesFor(record: TableRecord, column: string): LegacyAttribute[] {
  const attributes: LegacyAttribute[] = [];

  for (const field of fieldNames(record)) {
    if (!isReservedField(field)) continue;

    const rest = field.slice(LEGACY_ATTRIBUTE_PREFIX.length);
    const separatorIndex = rest.indexOf(LEGACY_ATTRIBUTE_SEPARATOR);
    const name = separatorIndex === -1 ? rest : rest.slice(0, separatorIndex);
    const target =
      separatorIndex === -1
        ? undefined
        : rest.slice(separatorIndex + LEGACY_ATTRIBUTE_SEPARATOR.length);

    if (!name) continue;

    if (target === undefined || target === column) {
      attributes.push({ name, value: fieldValue(record, field) });
    }
  }

  return attributes;
}
