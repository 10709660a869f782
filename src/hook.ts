#!/usr/bin/env node
/**
 * Post-tool hook: reads the host's tool-use JSON from stdin and appends a
 * trace log entry. Always exits 0 so a logging problem never blocks the
 * agent.
 */

import { config } from 'dotenv';
config();

import { text } from 'node:stream/consumers';
import { formatErrorForLog } from './errors/index.js';
import { getTraceLogPath } from './paths.js';
import { recordHookInvocation } from './sources/trace-log.js';

async function main(): Promise<void> {
  const logPath = process.env.WATCHTOWER_TRACE_LOG || getTraceLogPath();
  try {
    await recordHookInvocation(await text(process.stdin), logPath);
  } catch (error) {
    console.error(`[watchtower-hook] ${formatErrorForLog(error)}`);
  }
  process.exit(0);
}

void main();
