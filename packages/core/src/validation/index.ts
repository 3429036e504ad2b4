export { fieldMappingSchema, lookupColumnSchema, entityMappingSchema } from './schemas.js';
