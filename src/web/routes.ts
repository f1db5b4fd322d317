import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ValidationError } from '../errors/index';
import { parseImageRequest, parseReportRequest, parseWeatherRequest } from '../boundaries/request-parser';
import { present } from '../output/presenter';
import { HandlerName, type DeskHandlers, type Handler } from '../handlers/types';
import type { PageRenderer } from './page-renderer';

export const PAGE_TITLE = 'Emergency Desk: Disaster Response Console';

/**
 * Wraps a handler as a JSON route: parse body, run handler, return its display text.
 * Body shape errors are 400s; handler failures are still 200 with readable text.
 */
function panelRoute<TInput>(name: HandlerName, parse: (raw: unknown) => TInput, handler: Handler<TInput>) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    let input: TInput;
    try {
      input = parse(request.body);
    } catch (e: unknown) {
      if (e instanceof ValidationError) {
        return reply.code(400).send({ error: e.message });
      }
      throw e;
    }

    const result = await handler(input);
    if (!result.ok) {
      request.log.warn({ handler: name, code: result.error.code }, result.error.message);
    }
    return { text: present(name, result) };
  };
}

export function registerDeskRoutes(app: FastifyInstance, handlers: DeskHandlers, renderer: PageRenderer) {
  const page = renderer.render('index.hbs', renderer.createContext(PAGE_TITLE));

  app.get('/', async (_request, reply) => reply.type('text/html; charset=utf-8').send(page));
  app.get('/health', async () => ({ ok: true }));

  // One JSON endpoint per panel
  app.post('/api/report', panelRoute(HandlerName.Report, parseReportRequest, handlers.report));
  app.post('/api/weather', panelRoute(HandlerName.Weather, parseWeatherRequest, handlers.weather));
  app.post('/api/image', panelRoute(HandlerName.Image, parseImageRequest, handlers.image));
}
