export type { MappingDiagnostic, DiagnosticsSink } from './diagnostics.js';
export type { ValueAccessor, AttributeLookup, StructuredDocument } from './document.js';
export type { MappingInput, MappedOutcome, FailedOutcome, MappingOutcome } from './mapping.js';
