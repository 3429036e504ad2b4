/**
 * RecordMapper
 *
 * Builds typed records from semi-structured source documents using the same
 * field mappings that describe the external table.
 *
 * An absent attribute is omitted from the record and reported to the
 * diagnostics sink. A present attribute with the wrong type throws and
 * aborts the record.
 */

import { BridgeError, Logger } from '@schemabridge/core';
import type { FieldMapping, MappedRecord, ScalarValue } from '@schemabridge/core';
import { matchAttributeType } from '../attributes/index.js';
import { createLoggerDiagnosticsSink } from '../diagnostics/index.js';
import type {
  DiagnosticsSink,
  MappingDiagnostic,
  MappingInput,
  MappingOutcome,
  StructuredDocument,
  ValueAccessor,
} from '../types/index.js';

/** Snapshot reported when a document cannot be serialized */
export const UNSERIALIZABLE_DOCUMENT = '[unserializable document]';

export interface RecordMapperOptions {
  /** Receives missing-attribute diagnostics (default: warnings on `logger`) */
  diagnostics?: DiagnosticsSink;
  logger?: Logger;
}

/**
 * Coerce a present value according to a mapping's attribute type
 * @throws BridgeError (TYPE_MISMATCH) if the value has an incompatible type
 */
export function coerceValue(value: ValueAccessor, attributeType: string): ScalarValue {
  return matchAttributeType<ScalarValue>(attributeType, {
    boolean: () => value.asBoolean(),
    integer: () => value.asInteger(),
    number: () => value.asDecimal(),
    text: () => value.asString(),
  });
}

/**
 * Target attributes mapped more than once. The later mapping wins when
 * records are built.
 */
export function findDuplicateTargets(fieldMappings: readonly FieldMapping[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const { targetAttribute } of fieldMappings) {
    if (seen.has(targetAttribute)) {
      duplicates.add(targetAttribute);
    }
    seen.add(targetAttribute);
  }
  return Array.from(duplicates);
}

export class RecordMapper {
  private readonly logger: Logger;
  private readonly diagnostics: DiagnosticsSink;

  constructor(options: RecordMapperOptions = {}) {
    this.logger = options.logger ?? new Logger();
    this.diagnostics = options.diagnostics ?? createLoggerDiagnosticsSink(this.logger);
  }

  /**
   * Map one document
   *
   * @param context - Identifier of the document, reported in diagnostics
   * @throws BridgeError (TYPE_MISMATCH) if a present attribute cannot be coerced
   */
  mapFields(
    document: StructuredDocument,
    fieldMappings: readonly FieldMapping[],
    context: string
  ): MappedRecord {
    return this.build(document, fieldMappings, context).record;
  }

  /**
   * Map several documents, keeping aborted records apart from partial ones
   */
  mapDocuments(
    inputs: readonly MappingInput[],
    fieldMappings: readonly FieldMapping[]
  ): MappingOutcome[] {
    return inputs.map(({ context, document }): MappingOutcome => {
      try {
        const { record, missing } = this.build(document, fieldMappings, context);
        return { status: 'mapped', context, record, missing };
      } catch (error) {
        if (error instanceof BridgeError) {
          return { status: 'failed', context, error };
        }
        throw error;
      }
    });
  }

  private build(
    document: StructuredDocument,
    fieldMappings: readonly FieldMapping[],
    context: string
  ): { record: MappedRecord; missing: string[] } {
    const record: MappedRecord = {};
    const missing: string[] = [];

    for (const mapping of fieldMappings) {
      const lookup = document.get(mapping.sourceAttribute);

      if (!lookup.found) {
        missing.push(mapping.sourceAttribute);
        this.emit({
          kind: 'missing-attribute',
          sourceAttribute: mapping.sourceAttribute,
          targetAttribute: mapping.targetAttribute,
          context,
          document: this.snapshot(document, context),
        });
        continue;
      }

      record[mapping.targetAttribute] = coerceValue(lookup.value, mapping.attributeType);
    }

    return { record, missing };
  }

  private snapshot(document: StructuredDocument, context: string): string {
    try {
      return document.serialize();
    } catch (error) {
      this.logger.error('Document snapshot failed', { error, context });
      return UNSERIALIZABLE_DOCUMENT;
    }
  }

  private emit(diagnostic: MappingDiagnostic): void {
    try {
      this.diagnostics(diagnostic);
    } catch (error) {
      this.logger.error('Diagnostics sink failed', { error, context: diagnostic.context });
    }
  }
}
