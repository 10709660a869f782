/**
 * Zod schema for watchtower configuration (config.json).
 *
 * Every knob has a default, so `PipelineConfigSchema.parse({})` is a
 * complete working configuration.
 */

import { z } from 'zod';

function retentionSchema(defaultMaxItems: number) {
  return z
    .object({
      maxItems: z.number().int().positive().default(defaultMaxItems),
      maxAgeMs: z.number().int().positive().optional(),
    })
    .strict();
}

const AgentEventsSchema = z
  .object({
    retention: retentionSchema(1000).default({}),
    maxPending: z.number().int().positive().default(256),
  })
  .strict();

const InsightsSchema = z
  .object({
    retention: retentionSchema(200).default({}),
    maxPending: z.number().int().positive().default(64),
  })
  .strict();

const FramesSchema = z
  .object({
    idleSessionMs: z.number().int().positive().default(300_000),
  })
  .strict();

const CriticSchema = z
  .object({
    capacity: z.number().int().positive().default(500),
    batchSize: z.number().int().positive().default(10),
    flushIntervalMs: z.number().int().positive().default(5000),
    /** 0 disables the timeout */
    analysisTimeoutMs: z.number().int().nonnegative().default(30000),
    criticalFailureCount: z.number().int().positive().default(3),
    minEventsForProcessNote: z.number().int().positive().default(5),
    summarize: z.boolean().default(false),
  })
  .strict();

const TraceLogSchema = z
  .object({
    /** Defaults to the XDG state dir */
    path: z.string().min(1).optional(),
    pollIntervalMs: z.number().int().positive().default(500),
    agentId: z.string().min(1).default('main'),
    fromEnd: z.boolean().default(false),
  })
  .strict();

const ServerSchema = z
  .object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(4319),
    heartbeatMs: z.number().int().positive().default(15000),
  })
  .strict();

const LoggingSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
    file: z.string().min(1).optional(),
  })
  .strict();

export const PipelineConfigSchema = z
  .object({
    /** First trace sequence handed out; lets a restart continue numbering */
    startSequence: z.number().int().nonnegative().default(1),
    agentEvents: AgentEventsSchema.default({}),
    insights: InsightsSchema.default({}),
    frames: FramesSchema.default({}),
    critic: CriticSchema.default({}),
    traceLog: TraceLogSchema.default({}),
    server: ServerSchema.default({}),
    logging: LoggingSchema.default({}),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export function defaultConfig(): PipelineConfig {
  return PipelineConfigSchema.parse({});
}
