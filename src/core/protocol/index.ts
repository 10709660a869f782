/**
 * Protocol Exports
 *
 * Trace events, frames and insights, with their zod schemas and guards.
 */

export * from './types.js';
