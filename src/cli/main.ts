#!/usr/bin/env node

/**
 * decision-agent CLI entry point.
 * All logic lives in core; this file only wires commander.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerAgentCommand } from './run.js';

const program = new Command();

program
  .name('decision-agent')
  .description(
    'Goal-directed analysis agent over a product review dataset. Plans steps, runs search/analysis/statistics operations, and synthesizes a recommendation.',
  )
  .version('0.1.0');

registerAgentCommand(program);

await program.parseAsync();
