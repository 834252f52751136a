#!/usr/bin/env node

/**
 * dealbook — Command Line Interface
 *
 * Thin driver over the CRM library: a sample walkthrough, the pipeline
 * analytics reports, and contact/deal export.
 *
 * @module cli
 */

import { Command } from 'commander';
import { ensureDirectories, getConfig, getDatabasePath } from '../config/config.js';
import { registerDemoCommand } from './commands/demo.js';
import { registerReportCommands } from './commands/report.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('dealbook')
  .description('dealbook — contacts, deals, activities and pipeline analytics')
  .version('1.0.0');

// ═══════════════════════════════════════════════════════════════════════════
// INIT COMMAND
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('init')
  .description('Create the data directory for the configured database')
  .action(() => {
    const config = getConfig();
    const result = ensureDirectories(config);
    if (!result.success) {
      process.stderr.write(`Failed to initialize: ${result.error.message}\n`);
      process.exit(1);
    }
    process.stdout.write(`Database: ${getDatabasePath(config)}\n`);
  });

registerDemoCommand(program);
registerReportCommands(program);

// ═══════════════════════════════════════════════════════════════════════════
// PARSE & EXECUTE
// ═══════════════════════════════════════════════════════════════════════════

program.parse(process.argv);
