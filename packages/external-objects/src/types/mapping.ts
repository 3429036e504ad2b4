/**
 * Record mapping inputs and outcomes
 */

import type { BridgeError, MappedRecord } from '@schemabridge/core';
import type { StructuredDocument } from './document.js';

/** One document to map, tagged with an identifier for diagnostics */
export interface MappingInput {
  context: string;
  document: StructuredDocument;
}

/** Record built, possibly with absent attributes omitted */
export interface MappedOutcome {
  status: 'mapped';
  context: string;
  record: MappedRecord;
  /** Source attributes that were absent and therefore omitted */
  missing: string[];
}

/** Record construction aborted by a malformed attribute */
export interface FailedOutcome {
  status: 'failed';
  context: string;
  error: BridgeError;
}

export type MappingOutcome = MappedOutcome | FailedOutcome;
