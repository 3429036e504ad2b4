/**
 * Filter syntax for querying records from a record source
 */

export type FilterOperator =
  | 'eq'   // equals
  | 'neq'  // not equals
  | 'in';  // value in array

export interface FilterCondition {
  field: string;
  op: FilterOperator;
  value: unknown;
}

export interface FilterOptions {
  /** Filter conditions (AND logic) */
  where?: FilterCondition[];
  /** Filter conditions (OR logic), combined with `where` by AND */
  anyOf?: FilterCondition[];
  /** Max records to return */
  limit?: number;
}
