/**
 * @schemabridge/external-objects
 *
 * Generates external table schemas from field mappings and maps
 * semi-structured source documents into typed records.
 */

import type { IRecordSource } from '@schemabridge/core';
import { RecordMapper as _RecordMapper, type RecordMapperOptions } from './mapping/index.js';
import {
  ContactResolver as _ContactResolver,
  type ContactResolverOptions,
} from './contacts/index.js';

// Types
export * from './types/index.js';

// Attribute types
export { ATTRIBUTE_TYPES, resolveAttributeType, matchAttributeType } from './attributes/index.js';
export type { AttributeTypeCases } from './attributes/index.js';

// Schema
export * from './schema/index.js';

// Documents
export * from './document/index.js';

// Record mapping
export {
  RecordMapper,
  coerceValue,
  findDuplicateTargets,
  UNSERIALIZABLE_DOCUMENT,
} from './mapping/index.js';
export type { RecordMapperOptions } from './mapping/index.js';

// Diagnostics
export * from './diagnostics/index.js';

// Contacts
export * from './contacts/index.js';

/**
 * Factory function to create a RecordMapper
 */
export function createRecordMapper(options?: RecordMapperOptions): _RecordMapper {
  return new _RecordMapper(options);
}

/**
 * Factory function to create a ContactResolver
 */
export function createContactResolver(
  source: IRecordSource,
  options?: ContactResolverOptions
): _ContactResolver {
  return new _ContactResolver(source, options);
}
