/**
 * Record types for data exchange with external sources
 */

/** Generic record type - a row of data */
export type Record = {
  [key: string]: unknown;
};

/** Scalar values a mapped record may hold */
export type ScalarValue = boolean | number | string;

/** Typed record produced from a source document, keyed by target attribute */
export type MappedRecord = {
  [targetAttribute: string]: ScalarValue;
};

/** Result of a read operation */
export interface ReadResult {
  /** The retrieved records */
  records: Record[];
  /** Total count (if available, for pagination) */
  totalCount?: number;
  /** Whether more records exist beyond the current page */
  hasMore?: boolean;
}
