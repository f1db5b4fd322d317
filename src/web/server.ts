import Fastify, { type FastifyInstance } from 'fastify';
import { MAX_BODY_BYTES } from '../config/constants';
import type { DeskHandlers } from '../handlers/types';
import { PageRenderer } from './page-renderer';
import { registerDeskRoutes } from './routes';

export interface ServerOptions {
  logLevel?: string;
  renderer?: PageRenderer;
}

export function buildServer(handlers: DeskHandlers, options: ServerOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: { level: options.logLevel ?? 'info' },
    bodyLimit: MAX_BODY_BYTES,
  });

  registerDeskRoutes(app, handlers, options.renderer ?? new PageRenderer());

  return app;
}

export async function startServer(
  handlers: DeskHandlers,
  listen: { port: number; host: string },
  options: ServerOptions = {}
): Promise<FastifyInstance> {
  const app = buildServer(handlers, options);
  await app.listen(listen);
  return app;
}
