#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   npm run schemabridge -- --catalog ./catalog.json --entity <name> [--document ./document.json]
 */

import { runCli } from './commands.js';

process.exitCode = await runCli(process.argv.slice(2));
