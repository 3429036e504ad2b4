/**
 * Record Source Interface
 *
 * Read-only access to records held by an external system (a CRM, a commerce
 * platform, an in-memory fixture). Lookups such as contact resolution depend
 * only on this contract.
 */

import type { FilterOptions, ReadResult } from '../types/index.js';

export interface IRecordSource {
  /** Unique identifier for this source, used in messages and logs */
  readonly id: string;

  /**
   * Read records from the source
   * @param options - Filter conditions and result limit
   */
  readRecords(options?: FilterOptions): Promise<ReadResult>;
}
