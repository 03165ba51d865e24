import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'node:http';
import { z } from 'zod';
import { isSchedulerEventType, matchesFilter } from '../events/index.js';
import type { EventFilter, SchedulerEvent } from '../events/index.js';
import type { EventSource } from '../metrics/index.js';
import type { Alert, AlertEngine } from '../alerting/index.js';
import { silentLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';

const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe'), taskId: z.string().min(1).optional(), types: z.array(z.string()).optional() }),
  z.object({ type: z.literal('unsubscribe') }),
  z.object({ type: z.literal('ping') }),
]);

interface StreamClient {
  ws: WebSocket;
  /** Empty means every event */
  filters: EventFilter[];
}

export interface EventStream {
  readonly clients: number;
  close(): Promise<void>;
}

function wants(client: StreamClient, event: SchedulerEvent): boolean {
  return client.filters.length === 0 || client.filters.some((f) => matchesFilter(f, event));
}

/**
 * Push scheduler events and alerts to WebSocket clients. A client narrows
 * its stream with `{ "type": "subscribe", "taskId"?, "types"? }` messages;
 * `unsubscribe` goes back to everything.
 */
export function attachEventStream(
  server: HttpServer,
  events: EventSource,
  alerts?: AlertEngine,
  logger: Logger = silentLogger,
): EventStream {
  const wss = new WebSocketServer({ server });
  const clients = new Set<StreamClient>();

  const send = (client: StreamClient, message: unknown) => {
    if (client.ws.readyState === WebSocket.OPEN) client.ws.send(JSON.stringify(message));
  };

  wss.on('connection', (ws) => {
    const client: StreamClient = { ws, filters: [] };
    clients.add(client);
    logger.debug(`client connected (${clients.size} total)`);

    ws.on('message', (raw) => {
      let data: unknown;
      try {
        data = JSON.parse(String(raw));
      } catch {
        send(client, { type: 'error', error: 'Message is not JSON' });
        return;
      }
      const parsed = ClientMessageSchema.safeParse(data);
      if (!parsed.success) {
        send(client, { type: 'error', error: 'Unknown message' });
        return;
      }
      const msg = parsed.data;
      switch (msg.type) {
        case 'subscribe':
          client.filters.push({ taskId: msg.taskId, types: msg.types?.filter(isSchedulerEventType) });
          send(client, { type: 'subscribed', filters: client.filters });
          break;
        case 'unsubscribe':
          client.filters = [];
          send(client, { type: 'subscribed', filters: client.filters });
          break;
        case 'ping':
          send(client, { type: 'pong' });
          break;
      }
    });

    ws.on('close', () => {
      clients.delete(client);
      logger.debug(`client disconnected (${clients.size} total)`);
    });
  });

  const offEvents = events.subscribe({}, (event) => {
    for (const client of clients) {
      if (wants(client, event)) send(client, { type: 'event', event });
    }
  });
  const offAlerts = alerts?.onAlert((alert: Alert) => {
    for (const client of clients) send(client, { type: 'alert', alert });
  });

  return {
    get clients() {
      return clients.size;
    },
    close() {
      offEvents();
      offAlerts?.();
      for (const client of clients) client.ws.terminate();
      return new Promise((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
