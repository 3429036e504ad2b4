/**
 * Structured document lookup
 *
 * Read access to a semi-structured source payload. Absence is reported as a
 * value; type mismatches are thrown by the accessor.
 */

/**
 * Typed view over a present attribute value.
 * Each method throws a `TYPE_MISMATCH` BridgeError when the underlying value
 * has an incompatible type.
 */
export interface ValueAccessor {
  /** The value as found in the document */
  readonly raw: unknown;
  asBoolean(): boolean;
  asInteger(): number;
  asDecimal(): number;
  asString(): string;
}

export type AttributeLookup =
  | { found: true; key: string; value: ValueAccessor }
  | { found: false; key: string };

export interface StructuredDocument {
  get(key: string): AttributeLookup;
  /** Human-readable serialization of the whole document */
  serialize(): string;
}
