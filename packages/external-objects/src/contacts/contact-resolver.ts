/**
 * ContactResolver
 *
 * Resolves the contact that owns external records from a single identifier.
 * The identifier may be any of several shapes (customer number, record id,
 * account id), so each identifier field is tried with an OR.
 */

import { BridgeError, formatMessage, wrapError } from '@schemabridge/core';
import type {
  FilterCondition,
  IRecordSource,
  ReadResult,
  Record as DataRecord,
} from '@schemabridge/core';

export const DEFAULT_IDENTIFIER_FIELDS: readonly string[] = ['customerId', 'id', 'accountId'];

export const DEFAULT_NOT_FOUND_MESSAGE = 'No contact found for identifier "{identifier}" in {source}';

export interface ContactResolverOptions {
  /** Fields compared against the identifier (default: customerId, id, accountId) */
  identifierFields?: string[];
  /** Message template, `{identifier}` and `{source}` are substituted */
  notFoundMessage?: string;
}

export class ContactResolver {
  private readonly identifierFields: readonly string[];
  private readonly notFoundMessage: string;

  constructor(
    private readonly source: IRecordSource,
    options: ContactResolverOptions = {}
  ) {
    this.identifierFields = options.identifierFields ?? DEFAULT_IDENTIFIER_FIELDS;
    this.notFoundMessage = options.notFoundMessage ?? DEFAULT_NOT_FOUND_MESSAGE;

    if (this.identifierFields.length === 0) {
      throw new BridgeError({
        code: 'CONFIGURATION_ERROR',
        message: 'ContactResolver needs at least one identifier field',
        sourceId: source.id,
      });
    }
  }

  /**
   * Find the contact matching the identifier on any identifier field
   * @returns The first match, or null
   */
  async findContact(identifier: string): Promise<DataRecord | null> {
    if (identifier.trim() === '') {
      throw new BridgeError({
        code: 'VALIDATION_ERROR',
        message: 'Contact identifier must not be empty',
        sourceId: this.source.id,
      });
    }

    const anyOf: FilterCondition[] = this.identifierFields.map((field): FilterCondition => ({
      field,
      op: 'eq',
      value: identifier,
    }));

    let result: ReadResult;
    try {
      result = await this.source.readRecords({ anyOf, limit: 1 });
    } catch (error) {
      throw wrapError(error, this.source.id, 'READ_FAILED');
    }

    return result.records[0] ?? null;
  }

  /**
   * Like {@link findContact}, but a missing contact is an error
   * @throws BridgeError (NOT_FOUND)
   */
  async resolveContact(identifier: string): Promise<DataRecord> {
    const contact = await this.findContact(identifier);
    if (contact) {
      return contact;
    }

    throw new BridgeError({
      code: 'NOT_FOUND',
      message: formatMessage(this.notFoundMessage, { identifier, source: this.source.id }),
      sourceId: this.source.id,
      suggestion: `Check that the identifier matches one of: ${this.identifierFields.join(', ')}.`,
      context: { identifier, identifierFields: [...this.identifierFields] },
    });
  }
}
