export type { ColumnKind, ColumnDefinition, TableDescriptor } from './schema.js';
export type {
  AttributeType,
  FieldMapping,
  LookupColumnConfig,
  EntityMapping,
} from './field-mapping.js';
export type { Record, ScalarValue, MappedRecord, ReadResult } from './record.js';
export type { FilterOperator, FilterCondition, FilterOptions } from './filter.js';
