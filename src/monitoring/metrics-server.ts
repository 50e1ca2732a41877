import http from 'http';
import type { Engine } from '../db/Engine';
import { logger } from '../utils/logger';
import { register } from './metrics';

function handle(engine: Engine, req: http.IncomingMessage, res: http.ServerResponse): void {
  if (req.method !== 'GET') {
    res.writeHead(405, { Allow: 'GET' });
    res.end();
    return;
  }

  switch (req.url) {
    case '/metrics':
      register.metrics().then((metrics) => {
        res.setHeader('Content-Type', register.contentType);
        res.end(metrics);
      }, (err: unknown) => {
        logger.error({ err }, 'Failed to collect metrics');
        res.writeHead(500);
        res.end('Error getting metrics');
      });
      return;

    case '/health':
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({
        status: 'healthy',
        service: 'nestkv',
        uptime: process.uptime(),
        session: {
          openBlocks: engine.depth,
          committedKeys: engine.committedKeys
        }
      }));
      return;

    default:
      res.writeHead(404);
      res.end();
  }
}

/**
 * Serves /metrics and /health for one session. Resolves once the port is
 * bound; rejects if it cannot be (EADDRINUSE, EACCES).
 */
export function startMetricsServer(port: number, engine: Engine): Promise<http.Server> {
  const server = http.createServer((req, res) => handle(engine, req, res));

  return new Promise((resolve, reject) => {
    const onStartupError = (err: Error) => {
      reject(err);
    };

    server.once('error', onStartupError);
    server.listen(port, () => {
      server.off('error', onStartupError);
      server.on('error', (err) => {
        logger.error({ err }, 'Metrics server failed');
      });

      logger.info({ port, action: 'metrics_listen' }, `Metrics server ready at http://localhost:${port}/metrics`);
      resolve(server);
    });
  });
}
