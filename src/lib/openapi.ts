import { OpenAPIHono } from '@hono/zod-openapi';
import { swaggerUI } from '@hono/swagger-ui';
import chunksApi from '../api/v1/chunks';
import type { ServerConfig } from './config';

export function createOpenAPIApp(config: Pick<ServerConfig, 'apiUrl'>) {
  const app = new OpenAPIHono();

  // API documentation
  app.doc('/doc', {
    openapi: '3.0.0',
    info: {
      version: '1.0.0',
      title: 'Audio Chunker API',
      description: `
      Splits recorded speech into chunks of bounded duration.

      **Pipeline:**
      - Cut on silence (amplitude threshold in dBFS)
      - Split phrases longer than maxSec at the quietest point near the middle
      - Merge short pieces with a fade and a silence gap, or pad them with silence

      **Endpoints:**
      - \`/api/v1/chunks/*\` - chunking endpoints
      - \`/rpc/*\` - the same operations as RPC procedures
      `,
    },
    servers: [
      {
        url: config.apiUrl,
        description: 'Development server',
      },
    ],
    tags: [
      {
        name: 'Chunking',
        description: 'Silence segmentation, quiet-point splitting and chunk assembly'
      }
    ]
  });

  // Swagger UI
  app.get('/ui', swaggerUI({ url: '/doc' }));

  // Mount API routes
  app.route('/api/v1/chunks', chunksApi);

  return app;
}
