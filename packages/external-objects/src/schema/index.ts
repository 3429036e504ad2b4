export {
  buildColumns,
  buildTableDescriptor,
  EXTERNAL_ID_COLUMN,
  DISPLAY_URL_COLUMN,
} from './schema-builder.js';
export {
  booleanColumn,
  integerColumn,
  numberColumn,
  textColumn,
  urlColumn,
  indirectLookupColumn,
  INTEGER_PRECISION,
  DECIMAL_PRECISION,
  DECIMAL_SCALE,
  TEXT_LENGTH,
} from './columns.js';
export type { ColumnMeta } from './columns.js';
