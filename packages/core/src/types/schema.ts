/**
 * Schema types for describing external (virtual) tables
 */

/** Column kinds an external table can declare */
export type ColumnKind =
  | { type: 'boolean' }
  | { type: 'integer'; precision: number }
  | { type: 'number'; precision: number; scale: number }
  | { type: 'text'; length: number }
  | { type: 'url' }
  | {
      type: 'indirectLookup';
      /** Entity the lookup resolves against */
      targetEntity: string;
      /** Field on the target entity matched by value */
      targetField: string;
    };

export interface ColumnDefinition {
  readonly name: string;
  readonly label: string;
  readonly description: string;
  readonly kind: ColumnKind;
}

export interface TableDescriptor {
  /** Unique identifier for this table */
  readonly name: string;
  readonly labelSingular: string;
  readonly labelPlural: string;
  readonly description: string;
  /** Column every row is identified by */
  readonly primaryKeyColumn: string;
  /** Columns in declaration order */
  readonly columns: readonly ColumnDefinition[];
}
