/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to the orchestrator, handles exit codes.
 * No business logic lives here.
 */

export {
  EXIT_CODES,
  listAgents,
  registerAgentsCommand,
  registerCheckCommand,
  parseCheckFlags,
  runCheck,
  runCheckCommand,
} from './run.js';
export type { CheckDeps, CheckOptions } from './run.js';
