/**
 * Server-Sent Events transport.
 *
 * Exposes the three channels to browsers:
 *
 *   GET /events              reliable trace events; resume with Last-Event-ID
 *   GET /insights            critic insights; resume with Last-Event-ID
 *   GET /frames?sessionId=   newest frames of a session (base64 payload)
 *   GET /health              pipeline stats as JSON
 *
 * Each client gets its own subscription. `writeSSE` waits while the client
 * is not reading, and the pump takes nothing from the subscription in the
 * meantime: a slow client on a reliable channel overflows its queue and is
 * disconnected, a slow frame client skips to the newest frame.
 */

import { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { serve, type ServerType } from '@hono/node-server';
import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';
import { streamSSE } from 'hono/streaming';
import type { Frame, InsightEnvelope, TraceEvent } from '../core/protocol/types.js';
import type { ObservabilityPipeline } from '../pipeline.js';
import { formatErrorForLog } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';

// =============================================================================
// MESSAGES
// =============================================================================

export interface SseMessage {
  event: string;
  id?: string;
  data: string;
}

/**
 * Parse a Last-Event-ID value into an acknowledgement key.
 */
export function parseLastEventId(value: string | null | undefined): number | undefined {
  if (value === undefined || value === null || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export function encodeTraceEvent(event: TraceEvent): SseMessage {
  return { event: 'trace', id: String(event.sequence), data: JSON.stringify(event) };
}

export function encodeInsight(envelope: InsightEnvelope): SseMessage {
  return { event: 'insight', id: String(envelope.ordinal), data: JSON.stringify(envelope.insight) };
}

export function encodeFrame(frame: Frame): SseMessage {
  return {
    event: 'frame',
    id: String(frame.sequence),
    data: JSON.stringify({
      sessionId: frame.sessionId,
      sequence: frame.sequence,
      timestamp: frame.timestamp,
      encoding: frame.encoding,
      width: frame.width,
      height: frame.height,
      data: Buffer.from(frame.bytes).toString('base64'),
    }),
  };
}

// =============================================================================
// PUMP
// =============================================================================

/**
 * The part of an SSE stream the pump needs.
 */
export interface SseWriter {
  writeSSE(message: SseMessage): Promise<void>;
}

export interface PumpSource<T> extends AsyncIterable<T> {
  close(): void;
}

/**
 * Write a subscription to a stream until the subscription closes. Each
 * write is awaited before the next item is taken.
 * @returns number of messages written
 */
export async function pumpSubscription<T>(
  source: PumpSource<T>,
  writer: SseWriter,
  encode: (item: T) => SseMessage
): Promise<number> {
  let sent = 0;
  try {
    for await (const item of source) {
      await writer.writeSSE(encode(item));
      sent++;
    }
  } finally {
    source.close();
  }
  return sent;
}

// =============================================================================
// APP
// =============================================================================

export interface SseAppOptions {
  /** Heartbeat interval that keeps proxies from closing idle streams (ms) */
  heartbeatMs?: number;
  /** Allowed CORS origin(s) (default: any) */
  corsOrigin?: string | string[];
  now?: () => number;
  logger?: StructuredLogger;
}

/**
 * Hono app serving the pipeline's channels.
 */
export function createSseApp(pipeline: ObservabilityPipeline, options: SseAppOptions = {}) {
  const heartbeatMs = options.heartbeatMs ?? 15_000;
  const now = options.now ?? Date.now;
  const log = options.logger ?? createComponentLogger('SseTransport');

  const app = new Hono();

  app.use('*', requestLogger((message) => log.debug(message)));
  app.use('*', cors({ origin: options.corsOrigin ?? '*', allowMethods: ['GET', 'OPTIONS'] }));

  function serveStream<T>(
    c: Context,
    route: string,
    source: PumpSource<T>,
    encode: (item: T) => SseMessage,
    preface: SseMessage[] = []
  ): Response {
    return streamSSE(
      c,
      async (stream) => {
        stream.onAbort(() => source.close());

        const heartbeat = setInterval(() => {
          stream
            .writeSSE({ event: 'heartbeat', data: JSON.stringify({ ts: now() }) })
            .catch((error: unknown) => {
              clearInterval(heartbeat);
              log.debug('Heartbeat failed', { route, error: formatErrorForLog(error) });
            });
        }, heartbeatMs);
        heartbeat.unref?.();

        log.debug('Client connected', { route });
        try {
          for (const message of preface) {
            await stream.writeSSE(message);
          }
          const sent = await pumpSubscription(source, stream, encode);
          log.debug('Client stream ended', { route, sent });
        } finally {
          clearInterval(heartbeat);
          source.close();
        }
      },
      async (error) => {
        log.error('Client stream failed', { route, error: formatErrorForLog(error) });
      }
    );
  }

  app.get('/health', (c) => c.json(pipeline.stats()));

  app.get('/events', (c) => {
    const lastAcked = parseLastEventId(c.req.header('Last-Event-ID') ?? c.req.query('lastEventId'));
    const sub = pipeline.agentEvents.subscribe({ lastAcked });
    const preface: SseMessage[] = sub.replay.truncated
      ? [{ event: 'gap', data: JSON.stringify({ lastAcked, replayed: sub.replay.replayed }) }]
      : [];
    return serveStream(c, '/events', sub, encodeTraceEvent, preface);
  });

  app.get('/insights', (c) => {
    const lastAcked = parseLastEventId(c.req.header('Last-Event-ID') ?? c.req.query('lastEventId'));
    return serveStream(c, '/insights', pipeline.insights.subscribe({ lastAcked }), encodeInsight);
  });

  app.get('/frames', (c) => {
    const sessionId = c.req.query('sessionId');
    if (!sessionId) {
      return c.json({ error: 'sessionId is required' }, 400);
    }
    return serveStream(c, '/frames', pipeline.frames.subscribe(sessionId), encodeFrame);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((error, c) => {
    log.error('Request failed', { path: c.req.path, error: formatErrorForLog(error) });
    return c.json({ error: 'Internal error' }, 500);
  });

  return app;
}

// =============================================================================
// SERVER
// =============================================================================

export interface SseServerOptions extends SseAppOptions {
  host?: string;
  port?: number;
}

export type SseApp = ReturnType<typeof createSseApp>;

export interface SseServer {
  readonly app: SseApp;
  listen(): Promise<AddressInfo>;
  close(): Promise<void>;
}

function asHttpServer(server: ServerType): Server {
  if (!(server instanceof Server)) {
    throw new Error('Expected an HTTP/1.1 server');
  }
  return server;
}

export function createSseServer(pipeline: ObservabilityPipeline, options: SseServerOptions = {}): SseServer {
  const app = createSseApp(pipeline, options);
  const hostname = options.host ?? '127.0.0.1';
  const port = options.port ?? 4319;
  let server: Server | null = null;

  return {
    app,
    listen: () =>
      new Promise<AddressInfo>((resolve, reject) => {
        const started: Server = asHttpServer(
          serve({ fetch: app.fetch, hostname, port }, (info) => {
            started.removeListener('error', reject);
            resolve(info);
          })
        );
        started.once('error', reject);
        server = started;
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        const current = server;
        server = null;
        if (current === null) {
          resolve();
          return;
        }
        // Open event streams would otherwise keep close() waiting
        current.closeAllConnections();
        current.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
