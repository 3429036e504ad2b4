/**
 * Attribute type classification shared by schema generation and record
 * mapping.
 */

import type { AttributeType } from '@schemabridge/core';

export const ATTRIBUTE_TYPES: readonly AttributeType[] = ['boolean', 'integer', 'number', 'text'];

/** One handler per attribute type */
export type AttributeTypeCases<R> = { [K in AttributeType]: () => R };

/**
 * Classify a catalog type tag. Unrecognized tags (and a missing tag) fall
 * back to `text`.
 */
export function resolveAttributeType(tag: string | undefined): AttributeType {
  switch (tag) {
    case 'boolean':
    case 'integer':
    case 'number':
    case 'text':
      return tag;
    default:
      return 'text';
  }
}

/**
 * Classify a type tag and run the matching handler
 */
export function matchAttributeType<R>(tag: string | undefined, cases: AttributeTypeCases<R>): R {
  return cases[resolveAttributeType(tag)]();
}
