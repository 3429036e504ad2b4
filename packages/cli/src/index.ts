/**
 * @schemabridge/cli
 *
 * Mapping catalog loading and the `schemabridge` command
 */

export {
  ConfigError,
  catalogFileSchema,
  expandEnvVars,
  findEntity,
  formatZodError,
  loadCatalog,
  parseCatalog,
} from './config.js';
export type { CatalogFile, EnvExpansionOptions } from './config.js';
export { runCli } from './commands.js';
export type { CliIo } from './commands.js';
