#!/usr/bin/env node
/**
 * units CLI
 *
 * Usage:
 *   units [--force] [--dry-run] [--root <dir>] <command> [name]
 *
 * Commands:
 *   status [name]      Show app status
 *   install [name]     Copy files, reload systemd, start services
 *   uninstall [name]   Stop services and remove installed files
 *   logs <name>        Follow an app's journal
 */

import { run } from './program.js';

process.exitCode = await run(process.argv.slice(2));
