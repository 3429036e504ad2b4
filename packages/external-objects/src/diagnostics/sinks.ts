/**
 * Diagnostics sinks for the record mapper
 */

import type { Logger } from '@schemabridge/core';
import type { DiagnosticsSink, MappingDiagnostic } from '../types/index.js';

/**
 * Log each diagnostic as a warning
 */
export function createLoggerDiagnosticsSink(logger: Logger): DiagnosticsSink {
  return (diagnostic) => {
    logger.warn('Source attribute missing', {
      sourceAttribute: diagnostic.sourceAttribute,
      targetAttribute: diagnostic.targetAttribute,
      context: diagnostic.context,
      document: diagnostic.document,
    });
  };
}

export interface CollectingSink {
  sink: DiagnosticsSink;
  diagnostics: MappingDiagnostic[];
}

/**
 * Keep diagnostics in memory, e.g. to report them after a batch
 */
export function createCollectingSink(): CollectingSink {
  const diagnostics: MappingDiagnostic[] = [];
  return {
    sink: (diagnostic) => {
      diagnostics.push(diagnostic);
    },
    diagnostics,
  };
}
