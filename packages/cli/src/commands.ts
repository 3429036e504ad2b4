/**
 * Command implementation behind `npm run schemabridge`
 *
 * Usage:
 *   npm run schemabridge -- --catalog ./catalog.json --entity B2C_Address
 *   npm run schemabridge -- --catalog ./catalog.json --entity B2C_Address --document ./address.json
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { BridgeError, Logger, type LogStream } from '@schemabridge/core';
import {
  buildTableDescriptor,
  createRecordMapper,
  findDuplicateTargets,
  parseJsonDocument,
} from '@schemabridge/external-objects';
import { findEntity, loadCatalog } from './config.js';

export interface CliIo {
  /** Command output (JSON) */
  stdout: LogStream;
  /** Usage text and logs */
  stderr: LogStream;
}

const USAGE = [
  'Usage: schemabridge --catalog <catalog.json> --entity <name> [--document <document.json>] [--context <id>]',
  '',
  'Without --document, prints the table descriptor of the entity.',
  'With --document, prints the record mapped from the document.',
].join('\n');

function readOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  return value && !value.startsWith('--') ? value : undefined;
}

/**
 * Run the command
 * @returns Process exit code
 */
export async function runCli(
  args: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  const catalogPath = readOption(args, '--catalog');
  const entityName = readOption(args, '--entity');

  if (!catalogPath || !entityName) {
    io.stderr.write(`${USAGE}\n`);
    return 1;
  }

  let logger = new Logger({ stream: io.stderr });

  try {
    const catalog = await loadCatalog(catalogPath);
    logger = new Logger({
      level: catalog.logging?.level,
      format: catalog.logging?.format,
      stream: io.stderr,
    });

    const entity = findEntity(catalog, entityName);
    const duplicates = findDuplicateTargets(entity.fieldMappings);
    if (duplicates.length > 0) {
      logger.warn('Target attributes mapped more than once, the later mapping wins', {
        entity: entity.name,
        targets: duplicates,
      });
    }

    const documentPath = readOption(args, '--document');
    if (!documentPath) {
      io.stdout.write(`${JSON.stringify(buildTableDescriptor(entity), null, 2)}\n`);
      return 0;
    }

    const content = await readFile(resolve(process.cwd(), documentPath), 'utf-8');
    const document = parseJsonDocument(content);
    const mapper = createRecordMapper({ logger: logger.child({ entity: entity.name }) });
    const context = readOption(args, '--context') ?? documentPath;
    const record = mapper.mapFields(document, entity.fieldMappings, context);

    io.stdout.write(`${JSON.stringify(record, null, 2)}\n`);
    return 0;
  } catch (error) {
    logger.error('Command failed', {
      error: error instanceof BridgeError ? error.toJSON() : error,
    });
    return 1;
  }
}
