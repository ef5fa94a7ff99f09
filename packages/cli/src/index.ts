#!/usr/bin/env node
import { Command } from 'commander';
import { registerSync } from './commands/sync.js';
import { registerCheck } from './commands/check.js';
import { registerBackup } from './commands/backup.js';

export const program = new Command();

program
  .name('metasync')
  .description('Keep addon.xml metadata and its .po catalogs in sync')
  .version('0.1.0');

registerSync(program);
registerCheck(program);
registerBackup(program);

program.parse();
