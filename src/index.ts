#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { program } from 'commander';
import { APP_NAME } from './config/constants';
import { registerHandlerCommands, registerServeCommand } from './cli/commands';
import { handleUnknownError } from './errors/index';
import * as logger from './output/logger';

// Variables already set in the environment win over .env
loadDotenv();

program
  .name(APP_NAME)
  .description('Emergency report triage console backed by an LLM completion endpoint')
  .version('0.1.0')
  .option('-v, --verbose', 'Enable verbose logging');

registerServeCommand(program);
registerHandlerCommands(program);

program.parseAsync().catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running command');
  logger.error(err.message);
  process.exit(1);
});
