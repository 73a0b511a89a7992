/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerAgentCommand, exitCodeFor } from './run.js';
export { EXAMPLE_GOALS, HELP_GOALS } from './examples.js';
