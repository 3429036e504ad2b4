import { describe, expect, it } from 'vitest';
import { BridgeError } from '@schemabridge/core';
import { createJsonDocument, parseJsonDocument } from '../src/document/index.js';
import type { ValueAccessor } from '../src/types/index.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

function valueOf(document: ReturnType<typeof createJsonDocument>, key: string): ValueAccessor {
  const lookup = document.get(key);
  if (!lookup.found) {
    throw new Error(`expected "${key}" to be present`);
  }
  return lookup.value;
}

describe('JsonDocument.get', () => {
  const document = createJsonDocument({
    city: 'Paris',
    zip: null,
    'a.b': 1,
    a: { b: 2 },
    address: { city: 'Lyon', lines: ['1 rue Haute', 'Bat. C'] },
  });

  it('reports present and absent keys', () => {
    expect(document.get('city')).toMatchObject({ found: true, key: 'city' });
    expect(document.get('country')).toEqual({ found: false, key: 'country' });
  });

  it('treats null values as absent', () => {
    expect(document.get('zip')).toEqual({ found: false, key: 'zip' });
  });

  it('walks dotted paths through objects and arrays', () => {
    expect(valueOf(document, 'address.city').asString()).toBe('Lyon');
    expect(valueOf(document, 'address.lines.1').asString()).toBe('Bat. C');
    expect(document.get('address.lines.first').found).toBe(false);
    expect(document.get('address.zip').found).toBe(false);
  });

  it('prefers an own property whose name contains a dot', () => {
    expect(valueOf(document, 'a.b').asInteger()).toBe(1);
  });
});

describe('JsonValueAccessor coercion', () => {
  const document = createJsonDocument({
    active: true,
    activeText: 'true',
    visits: 42,
    balance: 12.5,
    name: 'Ada',
    tags: ['vip'],
    meta: { source: 'web' },
  });

  it('reads values of the expected type', () => {
    expect(valueOf(document, 'active').asBoolean()).toBe(true);
    expect(valueOf(document, 'visits').asInteger()).toBe(42);
    expect(valueOf(document, 'visits').asDecimal()).toBe(42);
    expect(valueOf(document, 'balance').asDecimal()).toBe(12.5);
    expect(valueOf(document, 'name').asString()).toBe('Ada');
  });

  it('renders numbers and booleans as text', () => {
    expect(valueOf(document, 'visits').asString()).toBe('42');
    expect(valueOf(document, 'balance').asString()).toBe('12.5');
    expect(valueOf(document, 'active').asString()).toBe('true');
  });

  it('throws TYPE_MISMATCH for a string where a boolean is expected', () => {
    const error = captureError(() => valueOf(document, 'activeText').asBoolean());

    expect(error).toBeInstanceOf(BridgeError);
    expect(error).toMatchObject({
      code: 'TYPE_MISMATCH',
      message: 'Attribute "activeText" cannot be read as boolean: found string',
      context: { key: 'activeText', expected: 'boolean', actual: 'string' },
    });
  });

  it('rejects fractional numbers as integers', () => {
    expect(captureError(() => valueOf(document, 'balance').asInteger())).toMatchObject({
      code: 'TYPE_MISMATCH',
      message: 'Attribute "balance" cannot be read as integer: found number',
    });
  });

  it('rejects integers beyond the exactly representable range', () => {
    const large = parseJsonDocument('{"id": 9007199254740993, "max": 9007199254740991}');

    expect(captureError(() => valueOf(large, 'id').asInteger())).toMatchObject({
      code: 'TYPE_MISMATCH',
      message: 'Attribute "id" cannot be read as integer: found number',
    });
    expect(valueOf(large, 'max').asInteger()).toBe(9007199254740991);
  });

  it('rejects arrays and objects as text', () => {
    expect(captureError(() => valueOf(document, 'tags').asString())).toMatchObject({
      message: 'Attribute "tags" cannot be read as text: found array',
    });
    expect(captureError(() => valueOf(document, 'meta').asString())).toMatchObject({
      message: 'Attribute "meta" cannot be read as text: found object',
    });
  });

  it('exposes the raw value', () => {
    expect(valueOf(document, 'tags').raw).toEqual(['vip']);
  });
});

describe('parseJsonDocument', () => {
  it('parses an object and serializes it back', () => {
    const document = parseJsonDocument('{ "city": "Paris", "zip": 75001 }');
    expect(document.serialize()).toBe('{"city":"Paris","zip":75001}');
  });

  it('strips a leading byte order mark', () => {
    expect(parseJsonDocument('\uFEFF{"city":"Paris"}').get('city').found).toBe(true);
  });

  it('rejects invalid JSON', () => {
    expect(captureError(() => parseJsonDocument('{city'))).toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('rejects a non-object root', () => {
    expect(captureError(() => parseJsonDocument('[1, 2]'))).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Source document must be a JSON object, got array',
    });
  });
});
