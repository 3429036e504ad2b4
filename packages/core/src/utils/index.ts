export { applyFilter, matchesAll, matchesAny } from './filter.js';
export { formatMessage } from './format.js';
