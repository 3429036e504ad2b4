/**
 * Column constructors with the fixed sizes used for external tables
 */

import type { ColumnDefinition } from '@schemabridge/core';

export const INTEGER_PRECISION = 10;
export const DECIMAL_PRECISION = 10;
export const DECIMAL_SCALE = 2;
export const TEXT_LENGTH = 255;

/** Name and display metadata of a column */
export interface ColumnMeta {
  name: string;
  label: string;
  description: string;
}

export function booleanColumn(meta: ColumnMeta): ColumnDefinition {
  return { ...meta, kind: { type: 'boolean' } };
}

export function integerColumn(meta: ColumnMeta, precision = INTEGER_PRECISION): ColumnDefinition {
  return { ...meta, kind: { type: 'integer', precision } };
}

export function numberColumn(
  meta: ColumnMeta,
  precision = DECIMAL_PRECISION,
  scale = DECIMAL_SCALE
): ColumnDefinition {
  return { ...meta, kind: { type: 'number', precision, scale } };
}

export function textColumn(meta: ColumnMeta, length = TEXT_LENGTH): ColumnDefinition {
  return { ...meta, kind: { type: 'text', length } };
}

export function urlColumn(meta: ColumnMeta): ColumnDefinition {
  return { ...meta, kind: { type: 'url' } };
}

/**
 * Relationship column resolved by matching its value against
 * `targetField` on `targetEntity`
 */
export function indirectLookupColumn(
  meta: ColumnMeta,
  targetEntity: string,
  targetField: string
): ColumnDefinition {
  return { ...meta, kind: { type: 'indirectLookup', targetEntity, targetField } };
}
