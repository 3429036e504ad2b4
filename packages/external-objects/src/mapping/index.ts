export {
  RecordMapper,
  coerceValue,
  findDuplicateTargets,
  UNSERIALIZABLE_DOCUMENT,
} from './record-mapper.js';
export type { RecordMapperOptions } from './record-mapper.js';
