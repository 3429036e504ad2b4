export {
  JsonDocument,
  JsonValueAccessor,
  createJsonDocument,
  parseJsonDocument,
} from './json-document.js';
