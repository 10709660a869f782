#!/usr/bin/env node
/**
 * watchtower - live observability for a running coding agent.
 *
 * Tails the tool trace log, runs the critic over the event stream and
 * serves trace events, insights and frames to the UI over SSE.
 *
 * Run: node dist/src/main.js
 */

// Load environment
import { config } from 'dotenv';
config();

import { loadConfig } from './config/index.js';
import { installProcessHandlers, registerCleanupResource } from './core/process-handlers.js';
import { ConsoleSink, FileSink, configureLogger, type LogSink } from './integrations/utilities/logger.js';
import { formatErrorForLog } from './errors/index.js';
import { getTraceLogPath } from './paths.js';
import { createPipeline } from './pipeline.js';
import { TraceLogTailer } from './sources/trace-log-tailer.js';
import { createSseServer } from './transport/sse.js';

async function main(): Promise<void> {
  const { config: settings, warnings } = loadConfig();

  const sinks: LogSink[] = [new ConsoleSink()];
  if (settings.logging.file) {
    sinks.push(new FileSink(settings.logging.file));
  }
  const log = configureLogger({ level: settings.logging.level, sinks }).withContext({ component: 'Main' });

  for (const warning of warnings) {
    log.warn(warning);
  }

  installProcessHandlers();

  const pipeline = createPipeline(settings);
  pipeline.start();
  registerCleanupResource({ name: 'pipeline', cleanup: () => pipeline.stop({ drain: true }) });

  const tailer = new TraceLogTailer({
    path: settings.traceLog.path ?? getTraceLogPath(),
    pollIntervalMs: settings.traceLog.pollIntervalMs,
    agentId: settings.traceLog.agentId,
    fromEnd: settings.traceLog.fromEnd,
    publish: (draft) => pipeline.publishTrace(draft),
  });
  await tailer.start();
  registerCleanupResource({ name: 'tailer', cleanup: () => tailer.stop() });

  const server = createSseServer(pipeline, {
    host: settings.server.host,
    port: settings.server.port,
    heartbeatMs: settings.server.heartbeatMs,
  });
  const address = await server.listen();
  registerCleanupResource({ name: 'server', cleanup: () => server.close() });

  log.info('Serving', { url: `http://${address.address}:${address.port}` });
}

main().catch((error: unknown) => {
  console.error(`[FATAL] ${formatErrorForLog(error)}`);
  process.exit(1);
});
