/**
 * JSON-backed structured document
 */

import { BridgeError } from '@schemabridge/core';
import type { AttributeLookup, StructuredDocument, ValueAccessor } from '../types/index.js';

type JsonObject = { [key: string]: unknown };

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value;
}

export class JsonValueAccessor implements ValueAccessor {
  constructor(
    private readonly key: string,
    readonly raw: unknown
  ) {}

  asBoolean(): boolean {
    if (typeof this.raw === 'boolean') {
      return this.raw;
    }
    throw this.mismatch('boolean');
  }

  asInteger(): number {
    if (typeof this.raw === 'number' && Number.isSafeInteger(this.raw)) {
      return this.raw;
    }
    throw this.mismatch('integer');
  }

  asDecimal(): number {
    if (typeof this.raw === 'number' && Number.isFinite(this.raw)) {
      return this.raw;
    }
    throw this.mismatch('number');
  }

  asString(): string {
    if (typeof this.raw === 'string') {
      return this.raw;
    }
    if ((typeof this.raw === 'number' && Number.isFinite(this.raw)) || typeof this.raw === 'boolean') {
      return String(this.raw);
    }
    throw this.mismatch('text');
  }

  private mismatch(expected: string): BridgeError {
    const actual = describeType(this.raw);
    return new BridgeError({
      code: 'TYPE_MISMATCH',
      message: `Attribute "${this.key}" cannot be read as ${expected}: found ${actual}`,
      suggestion: 'Check the attributeType configured for this attribute in the mapping catalog.',
      context: { key: this.key, expected, actual },
    });
  }
}

/**
 * Structured document over a parsed JSON object.
 *
 * A key naming an own property is read directly; otherwise it is walked as
 * a dot-separated path (`address.city`, `lines.0`). `null` counts as absent.
 */
export class JsonDocument implements StructuredDocument {
  constructor(private readonly root: JsonObject) {}

  get(key: string): AttributeLookup {
    const value = this.resolve(key);
    if (value === undefined || value === null) {
      return { found: false, key };
    }
    return { found: true, key, value: new JsonValueAccessor(key, value) };
  }

  serialize(): string {
    return JSON.stringify(this.root);
  }

  private resolve(key: string): unknown {
    if (Object.hasOwn(this.root, key)) {
      return this.root[key];
    }
    if (!key.includes('.')) {
      return undefined;
    }

    let current: unknown = this.root;
    for (const segment of key.split('.')) {
      if (Array.isArray(current)) {
        current = /^\d+$/.test(segment) ? current[Number(segment)] : undefined;
      } else if (isJsonObject(current) && Object.hasOwn(current, segment)) {
        current = current[segment];
      } else {
        return undefined;
      }
    }
    return current;
  }
}

/**
 * Wrap an already-parsed value
 * @throws BridgeError if the value is not a JSON object
 */
export function createJsonDocument(value: unknown): JsonDocument {
  if (!isJsonObject(value)) {
    throw new BridgeError({
      code: 'VALIDATION_ERROR',
      message: `Source document must be a JSON object, got ${describeType(value)}`,
    });
  }
  return new JsonDocument(value);
}

/**
 * Parse JSON text into a document
 * @throws BridgeError on invalid JSON or a non-object root
 */
export function parseJsonDocument(text: string): JsonDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new BridgeError({
      code: 'VALIDATION_ERROR',
      message: `Source document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return createJsonDocument(parsed);
}
