#!/usr/bin/env node

/**
 * searchloop CLI entry point.
 * Thin wrapper; all logic is delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand, registerGenerateCommand } from './run.js';

const program = new Command();

program
  .name('searchloop')
  .description(
    'Paced web search cycles: an LLM writes each query, Playwright types it like a person, every outcome lands in a CSV run log.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerGenerateCommand(program);

await program.parseAsync();
