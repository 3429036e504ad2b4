export { ATTRIBUTE_TYPES, resolveAttributeType, matchAttributeType } from './attribute-type.js';
export type { AttributeTypeCases } from './attribute-type.js';
