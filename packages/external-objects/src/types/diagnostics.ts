/**
 * Diagnostics emitted while mapping source documents
 */

/** A mapped source attribute was absent from the document */
export interface MappingDiagnostic {
  kind: 'missing-attribute';
  sourceAttribute: string;
  targetAttribute: string;
  /** Caller-supplied identifier of the document being mapped */
  context: string;
  /** Serialized snapshot of the whole source document */
  document: string;
}

/** Receives diagnostics. Must not be relied on for control flow. */
export type DiagnosticsSink = (diagnostic: MappingDiagnostic) => void;
