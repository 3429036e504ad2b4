/**
 * Filter utilities for applying filters to records in memory
 * Used by in-memory record sources and for client-side filtering
 */

import type { FilterCondition, FilterOptions, Record } from '../types/index.js';

function matchCondition(value: unknown, condition: FilterCondition): boolean {
  switch (condition.op) {
    case 'eq':
      return value === condition.value;
    case 'neq':
      return value !== condition.value;
    case 'in':
      return Array.isArray(condition.value) && condition.value.includes(value);
  }
}

/**
 * Check if a record matches all filter conditions
 */
export function matchesAll(record: Record, conditions: FilterCondition[]): boolean {
  return conditions.every((condition) => matchCondition(record[condition.field], condition));
}

/**
 * Check if a record matches at least one filter condition
 */
export function matchesAny(record: Record, conditions: FilterCondition[]): boolean {
  return conditions.some((condition) => matchCondition(record[condition.field], condition));
}

/**
 * Keep the records matching every `where` condition and, when given, at
 * least one `anyOf` condition, up to `limit`
 */
export function applyFilter(records: Record[], options?: FilterOptions): Record[] {
  if (!options) {
    return records;
  }

  const where = options.where ?? [];
  const anyOf = options.anyOf ?? [];

  const result = records.filter(
    (record) => matchesAll(record, where) && (anyOf.length === 0 || matchesAny(record, anyOf))
  );

  return options.limit === undefined ? result : result.slice(0, options.limit);
}
