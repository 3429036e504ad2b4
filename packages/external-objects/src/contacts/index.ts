export {
  ContactResolver,
  DEFAULT_IDENTIFIER_FIELDS,
  DEFAULT_NOT_FOUND_MESSAGE,
} from './contact-resolver.js';
export type { ContactResolverOptions } from './contact-resolver.js';
