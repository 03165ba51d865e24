import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import { silentLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import { errorMessage } from '../errors/index.js';
import { handleApiRequest } from './routes.js';
import type { ApiContext } from './routes.js';
import { attachEventStream } from './ws.js';
import type { EventStream } from './ws.js';

const MAX_BODY_BYTES = 1024 * 1024;

export interface ServerOptions {
  port: number;
  host?: string;
  logger?: Logger;
}

export interface RunningServer {
  server: Server;
  stream: EventStream;
  url: string;
  close(): Promise<void>;
}

function json(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' });
  res.end(JSON.stringify(data));
}

async function readBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new Error('Request body too large');
    chunks.push(buf);
  }
  if (chunks.length === 0) return undefined;
  return JSON.parse(Buffer.concat(chunks).toString('utf-8'));
}

/** HTTP API plus the WebSocket event stream on the same port. */
export function startServer(ctx: ApiContext, opts: ServerOptions): Promise<RunningServer> {
  const logger = opts.logger ?? silentLogger;
  const host = opts.host ?? '127.0.0.1';

  const server = createServer((req, res) => {
    const started = Date.now();
    const url = new URL(req.url ?? '/', `http://${host}:${opts.port}`);
    const method = req.method ?? 'GET';

    if (method === 'OPTIONS') {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET,POST',
        'Access-Control-Allow-Headers': 'Content-Type',
      });
      res.end();
      return;
    }

    const respond = (status: number, body: unknown) => {
      json(res, body, status);
      ctx.collector.recordRequest({ method, path: url.pathname, statusCode: status, durationMs: Date.now() - started });
    };

    void readBody(req)
      .then(
        (body) => handleApiRequest(ctx, { method, path: url.pathname, query: url.searchParams, body }),
        (err: unknown) => ({ status: 400, body: { error: `Bad request body: ${errorMessage(err)}` } }),
      )
      .then((response) => respond(response.status, response.body))
      .catch((err: unknown) => {
        logger.error(`${method} ${url.pathname} failed`, { error: errorMessage(err) });
        respond(500, { error: errorMessage(err) });
      });
  });

  const stream = attachEventStream(server, ctx.scheduler, ctx.alerts, logger.child('ws'));

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(opts.port, host, () => {
      server.off('error', reject);
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : opts.port;
      const url = `http://${host}:${port}`;
      logger.info(`API listening on ${url}`);
      resolve({
        server,
        stream,
        url,
        async close() {
          await stream.close();
          await new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done())));
        },
      });
    });
  });
}
