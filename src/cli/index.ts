#!/usr/bin/env node

import { Command } from 'commander';
import { registerCrawlCommand } from './commands/crawl.js';
import { registerLedgerCommand } from './commands/ledger.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('linkvault')
    .description('Download images from Telegraph/Graph pages and media from Telegram channel posts')
    .version('0.1.0')
    .enablePositionalOptions();

  registerCrawlCommand(program);
  registerLedgerCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
