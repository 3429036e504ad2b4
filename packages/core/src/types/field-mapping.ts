/**
 * Field Mapping Types
 *
 * Declarative catalog entries pairing a source-document attribute with a
 * column of the generated external table.
 */

/** Attribute types understood by schema generation and record mapping */
export type AttributeType = 'boolean' | 'integer' | 'number' | 'text';

/** Single field mapping definition */
export interface FieldMapping {
  /** Key of the attribute inside the source document */
  sourceAttribute: string;
  /** Column name in the generated schema and key in mapped records */
  targetAttribute: string;
  /**
   * Semantic type tag. Kept as a plain string: tags outside
   * {@link AttributeType} are accepted and treated as text.
   */
  attributeType: string;
  label: string;
  description: string;
}

/** Indirect lookup column linking the external table to a parent entity */
export interface LookupColumnConfig {
  /** Column name */
  column: string;
  label: string;
  description: string;
  /** Entity the lookup resolves against */
  targetEntity: string;
  /** Field on the target entity matched by value */
  targetField: string;
}

/** Everything needed to describe one external entity */
export interface EntityMapping {
  name: string;
  labelSingular: string;
  labelPlural: string;
  description: string;
  lookup: LookupColumnConfig;
  fieldMappings: FieldMapping[];
}
