/**
 * Schema Builder
 *
 * Turns field mappings into the column list and table descriptor of an
 * external entity.
 */

import type {
  ColumnDefinition,
  EntityMapping,
  FieldMapping,
  TableDescriptor,
} from '@schemabridge/core';
import { matchAttributeType } from '../attributes/index.js';
import {
  booleanColumn,
  integerColumn,
  numberColumn,
  textColumn,
  urlColumn,
  indirectLookupColumn,
  type ColumnMeta,
} from './columns.js';

/** Unique identifier every external record carries; the primary key */
export const EXTERNAL_ID_COLUMN = 'ExternalId';
/** Deep link back to the record in the source system */
export const DISPLAY_URL_COLUMN = 'DisplayUrl';

/**
 * Build one column per mapping, in input order
 */
export function buildColumns(fieldMappings: readonly FieldMapping[]): ColumnDefinition[] {
  return fieldMappings.map((mapping) => {
    const meta: ColumnMeta = {
      name: mapping.targetAttribute,
      label: mapping.label,
      description: mapping.description,
    };

    return matchAttributeType(mapping.attributeType, {
      boolean: () => booleanColumn(meta),
      integer: () => integerColumn(meta),
      number: () => numberColumn(meta),
      text: () => textColumn(meta),
    });
  });
}

/**
 * Build the table descriptor of an external entity.
 *
 * Columns are the mapped columns followed by `ExternalId`, `DisplayUrl` and
 * the indirect lookup, in that order. `ExternalId` is the primary key.
 */
export function buildTableDescriptor(entity: EntityMapping): TableDescriptor {
  const { lookup } = entity;
  const columns = buildColumns(entity.fieldMappings);

  const lookupColumn = indirectLookupColumn(
    { name: lookup.column, label: lookup.label, description: lookup.description },
    lookup.targetEntity,
    lookup.targetField
  );

  columns.push(
    textColumn({
      name: EXTERNAL_ID_COLUMN,
      label: 'External ID',
      description: 'Unique identifier of the record in the source system',
    }),
    urlColumn({
      name: DISPLAY_URL_COLUMN,
      label: 'Display URL',
      description: 'Link to the record in the source system',
    }),
    lookupColumn
  );

  return {
    name: entity.name,
    labelSingular: entity.labelSingular,
    labelPlural: entity.labelPlural,
    description: entity.description,
    primaryKeyColumn: EXTERNAL_ID_COLUMN,
    columns,
  };
}
