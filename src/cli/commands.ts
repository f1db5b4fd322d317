import type { Command } from 'commander';
import { readFileSync } from 'fs';
import { parseAnalyzeOptions, parseGlobalOptions, parseServeOptions } from '../boundaries/cli-parser';
import { parseEnvironment } from '../boundaries/env-parser';
import { handleUnknownError } from '../errors/index';
import { createHandlersFromEnv } from '../handlers/index';
import { HandlerName, type DeskHandlers, type HandlerResult } from '../handlers/types';
import { present } from '../output/presenter';
import * as logger from '../output/logger';
import { ProviderType, type EnvConfig } from '../schemas/env-schemas';
import type { ServeOptions } from '../schemas/cli-schemas';
import { startServer } from '../web/server';

interface CommandContext {
  env: EnvConfig;
  handlers: DeskHandlers;
  verbose: boolean;
}

/*
 * Validates global options and environment, then wires the handlers.
 * One-shot commands run silent unless verbose, so stdout carries only the report text.
 * Exits the process on configuration errors.
 */
function prepare(program: Command, oneShot: boolean): CommandContext {
  let verbose = false;
  let env: EnvConfig;
  try {
    verbose = parseGlobalOptions(program.opts()).verbose;
    env = parseEnvironment();
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Validating configuration');
    logger.error(err.message);
    logger.error('Please set these in your .env file or environment.');
    process.exit(1);
  }

  logger.setVerboseMode(verbose);
  logger.setSilentMode(oneShot && !verbose);
  logger.debug(`Completion provider: ${env.LLM_PROVIDER}`);
  if (env.LLM_PROVIDER === ProviderType.Stub) {
    logger.warn('LLM_PROVIDER is stub; reports are answered with canned text.');
  }
  return { env, handlers: createHandlersFromEnv(env, { debug: verbose }), verbose };
}

function printResult(handler: HandlerName, result: HandlerResult): void {
  console.log(present(handler, result));
  if (!result.ok) {
    process.exitCode = 1;
  }
}

/*
 * Registers the `serve` command, which hosts the three-panel web page.
 */
export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the web console')
    .option('-p, --port <port>', 'Port to listen on (defaults to PORT)')
    .option('--host <host>', 'Interface to bind (defaults to HOST)')
    .action(async (opts: unknown) => {
      const { env, handlers, verbose } = prepare(program, false);

      let serveOptions: ServeOptions;
      try {
        serveOptions = parseServeOptions(opts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing serve options');
        logger.error(err.message);
        process.exit(1);
      }

      const listen = { port: serveOptions.port ?? env.PORT, host: serveOptions.host ?? env.HOST };
      try {
        await startServer(handlers, listen, { logLevel: verbose ? 'debug' : env.LOG_LEVEL });
        logger.log(`Console ready at http://${listen.host}:${listen.port}/`);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Starting server');
        logger.error(`Failed to start server: ${err.message}`);
        process.exit(1);
      }
    });
}

/*
 * Registers the one-shot commands that run a single handler and print its text.
 */
export function registerHandlerCommands(program: Command): void {
  program
    .command('analyze')
    .description('Analyze an emergency report once and print the formatted result')
    .argument('<text...>', 'emergency description')
    .option('-u, --urgency <level>', 'Urgency level: Low, Medium or High', 'Medium')
    .action(async (text: string[], opts: unknown) => {
      const { handlers } = prepare(program, true);
      let urgency: string;
      try {
        urgency = parseAnalyzeOptions(opts).urgency;
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing analyze options');
        logger.error(err.message);
        process.exit(1);
      }
      printResult(HandlerName.Report, await handlers.report({ reportText: text.join(' '), urgency }));
    });

  program
    .command('weather')
    .description('Print the weather advisory for a location')
    .argument('<location...>', 'location name')
    .action(async (location: string[]) => {
      const { handlers } = prepare(program, true);
      printResult(HandlerName.Weather, await handlers.weather({ location: location.join(' ') }));
    });

  program
    .command('image')
    .description('Print the damage assessment summary for an image file')
    .argument('<file>', 'path to the image')
    .action(async (file: string) => {
      const { handlers } = prepare(program, true);
      let image: Buffer;
      try {
        image = readFileSync(file);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Reading image file');
        logger.error(`Cannot read ${file}: ${err.message}`);
        process.exit(1);
      }
      printResult(HandlerName.Image, await handlers.image({ image }));
    });
}
