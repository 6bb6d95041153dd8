#!/usr/bin/env node

/**
 * pagecheck CLI entry point.
 * Thin wrapper: all logic delegated to core and the agents.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerAgentsCommand, registerCheckCommand } from './run.js';

const program = new Command();

program
  .name('pagecheck')
  .description(
    'Web page validation: scrape text or screenshots with Playwright, review them with an LLM, report the findings.',
  )
  .version('0.1.0');

registerCheckCommand(program);
registerAgentsCommand(program);

await program.parseAsync();
