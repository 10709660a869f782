/**
 * Queue System Exports
 *
 * The bounded structures every channel is built from:
 * - AtomicCounter / SequenceCounter: identifier and sequence generation
 * - RingBuffer: fixed-capacity, drop-oldest buffer (retention, critic input)
 * - OutboundQueue: bounded per-subscriber queue that never blocks the channel
 * - LatestSlot: single-value holder for latest-wins delivery
 */

export { AtomicCounter, SequenceCounter } from './atomic-counter.js';

export { RingBuffer } from './ring-buffer.js';

export {
  OutboundQueue,
  type OutboundQueueConfig,
  type OfferResult,
  type CloseReason,
} from './outbound-queue.js';

export { LatestSlot } from './latest-slot.js';
