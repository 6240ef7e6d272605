import fastify, { FastifyInstance } from 'fastify';
import {
  HighlightController,
  HighlightsQuery,
  SyncDocumentBody,
} from '../../adapters/controllers/HighlightController';

export function createServer(controller: HighlightController): FastifyInstance {
  const server = fastify();

  server.get<{ Querystring: HighlightsQuery }>(
    '/highlights',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: {
            id: { type: 'string', pattern: '^.+:\\d+:\\d+$' },
            scope: { type: 'array', items: { type: 'string', minLength: 1 } },
          },
          required: ['id'],
        },
      },
    },
    controller.highlights.bind(controller),
  );

  server.put<{ Body: SyncDocumentBody }>(
    '/documents',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            path: { type: 'string', minLength: 1 },
            text: { type: 'string' },
          },
          required: ['path', 'text'],
        },
      },
    },
    controller.syncDocument.bind(controller),
  );

  server.get('/health', async () => ({ status: 'ok' }));
  server.post('/shutdown', async () => {
    setTimeout(() => process.kill(process.pid, 'SIGTERM'), 200);
    return { status: 'shutting down' };
  });

  return server;
}
