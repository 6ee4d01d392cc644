/**
 * Command registration
 */

import type { Command } from 'commander';
import { registerAggregateCommand } from './aggregate.js';
import { registerFilesCommand } from './files.js';
import { registerIngestCommands } from './ingest.js';
import { registerRunCommand } from './run.js';
import { registerSummaryCommand } from './summary.js';

export function registerCommands(program: Command): void {
  registerIngestCommands(program);
  registerAggregateCommand(program);
  registerRunCommand(program);
  registerSummaryCommand(program);
  registerFilesCommand(program);
}
