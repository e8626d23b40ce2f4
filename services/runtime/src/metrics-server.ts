import http from 'node:http';

import { logger } from './logger';
import { registry } from './metrics';

export interface MetricsServerHandle {
  close(): Promise<void>;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

export async function startMetricsServer(port: number, host = '127.0.0.1'): Promise<MetricsServerHandle> {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics') {
      registry.metrics().then(
        (metrics) => {
          res.writeHead(200, { 'content-type': registry.contentType });
          res.end(metrics);
        },
        (error: unknown) => {
          logger.error({ err: error }, 'Metrics collection failed');
          sendJson(res, 500, { error: 'collect_failed' });
        },
      );
      return;
    }

    if (req.url === '/health') {
      sendJson(res, 200, { status: 'ok', uptime_s: Math.round(process.uptime()) });
      return;
    }

    sendJson(res, 404, { error: 'not_found' });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  logger.info({ port, host }, 'Metrics server listening');

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }),
  };
}
