export type { IRecordSource } from './record-source.js';
