/**
 * Frame Channel
 *
 * Best-effort, latest-wins delivery of screen frames. Each session has one
 * slot holding its newest frame; publishing overwrites it. A subscriber that
 * reads slower than frames arrive silently skips the ones it missed. There
 * is no backlog and no replay: a new subscriber starts at the newest frame.
 *
 * A session with no subscribers and no frame for `idleSessionMs` is dropped,
 * either when its last subscriber leaves or on the next publish sweep.
 */

import type { Frame } from '../core/protocol/types.js';
import { AtomicCounter } from '../core/queues/atomic-counter.js';
import { LatestSlot } from '../core/queues/latest-slot.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';

export interface FrameChannelConfig {
  /** Unwatched sessions without a new frame for this long are dropped (ms) */
  idleSessionMs?: number;
  now?: () => number;
  logger?: StructuredLogger;
}

export const DEFAULT_IDLE_SESSION_MS = 300_000;

export interface FrameChannelStats {
  sessions: number;
  subscribers: number;
  published: number;
  /** Frames ignored because a newer one was already in the slot */
  stale: number;
  /** Idle sessions dropped */
  pruned: number;
}

// =============================================================================
// SUBSCRIPTION
// =============================================================================

/**
 * Reader of one session's frames. Delivered sequences strictly increase.
 */
export class FrameSubscription implements AsyncIterable<Frame> {
  readonly id: string;
  readonly sessionId: string;
  readonly channelKind = 'lossy' as const;
  private readonly slot: LatestSlot<Frame>;
  private readonly onClose: (sub: FrameSubscription) => void;
  private seenVersion: number;
  private skippedCount = 0;
  private deliveredCount = 0;
  private closed = false;
  private readonly closing = new AbortController();

  constructor(
    id: string,
    sessionId: string,
    slot: LatestSlot<Frame>,
    onClose: (sub: FrameSubscription) => void
  ) {
    this.id = id;
    this.sessionId = sessionId;
    this.slot = slot;
    this.onClose = onClose;
    // The frame already in the slot counts as unseen
    this.seenVersion = slot.get() === undefined ? slot.version : slot.version - 1;
  }

  /**
   * Newest frame this subscriber has not seen, waiting for one if needed.
   * @returns null once the subscription or its session is closed
   */
  async next(): Promise<Frame | null> {
    while (true) {
      if (this.closed || this.slot.isClosed()) {
        return null;
      }

      const version = this.slot.version;
      const frame = this.slot.get();
      if (frame !== undefined && version > this.seenVersion) {
        this.skippedCount += version - this.seenVersion - 1;
        this.seenVersion = version;
        this.deliveredCount++;
        return frame;
      }

      await this.slot.waitForChange(version, this.closing.signal);
    }
  }

  /** Frames overwritten before this subscriber read them */
  get skipped(): number {
    return this.skippedCount;
  }

  get delivered(): number {
    return this.deliveredCount;
  }

  isClosed(): boolean {
    return this.closed || this.slot.isClosed();
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.closing.abort();
    this.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Frame> {
    while (true) {
      const frame = await this.next();
      if (frame === null) {
        return;
      }
      yield frame;
    }
  }
}

// =============================================================================
// CHANNEL
// =============================================================================

interface SessionFrames {
  slot: LatestSlot<Frame>;
  subscribers: Set<FrameSubscription>;
  /** Creation or last accepted publish */
  touchedAt: number;
}

export class FrameChannel {
  private readonly sessions = new Map<string, SessionFrames>();
  private readonly ids = new AtomicCounter('frame-sub');
  private readonly log: StructuredLogger;
  private readonly idleSessionMs: number;
  private readonly now: () => number;
  private publishedCount = 0;
  private staleCount = 0;
  private prunedCount = 0;
  private lastSweep: number;
  private closed = false;

  constructor(config: FrameChannelConfig = {}) {
    this.log = config.logger ?? createComponentLogger('FrameChannel');
    this.idleSessionMs = config.idleSessionMs ?? DEFAULT_IDLE_SESSION_MS;
    this.now = config.now ?? Date.now;
    this.lastSweep = this.now();
  }

  /**
   * Replaces the session's latest frame. Never waits.
   * @returns false if the frame was stale or the channel is closed
   */
  publish(frame: Frame): boolean {
    if (this.closed) {
      return false;
    }
    this.sweepIdleSessions();

    const session = this.session(frame.sessionId);
    const current = session.slot.get();
    if (current !== undefined && frame.sequence <= current.sequence) {
      this.staleCount++;
      this.log.trace('Stale frame ignored', {
        sessionId: frame.sessionId,
        sequence: frame.sequence,
        latest: current.sequence,
      });
      return false;
    }

    session.slot.set(frame);
    session.touchedAt = this.now();
    this.publishedCount++;
    return true;
  }

  /**
   * Starts reading a session's frames from the newest one available.
   */
  subscribe(sessionId: string): FrameSubscription {
    if (this.closed) {
      const dead = new LatestSlot<Frame>();
      dead.close();
      return new FrameSubscription(this.ids.next(), sessionId, dead, () => undefined);
    }

    const session = this.session(sessionId);
    const sub = new FrameSubscription(this.ids.next(), sessionId, session.slot, (closed) => {
      session.subscribers.delete(closed);
      if (this.isIdle(session)) {
        this.dropSession(sessionId, session);
      }
    });
    session.subscribers.add(sub);
    this.log.debug('Frame subscriber opened', { sessionId, subscriberId: sub.id });
    return sub;
  }

  latest(sessionId: string): Frame | undefined {
    return this.sessions.get(sessionId)?.slot.get();
  }

  /**
   * Drops a session's slot and ends its subscriptions.
   */
  clearSession(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return;
    }
    this.sessions.delete(sessionId);
    session.slot.close();
    for (const sub of [...session.subscribers]) {
      sub.close();
    }
  }

  /**
   * Drops every idle session. Runs at most once per `idleSessionMs` from publish().
   * @returns number of sessions dropped
   */
  sweepIdleSessions(force = false): number {
    const now = this.now();
    if (!force && now - this.lastSweep < this.idleSessionMs) {
      return 0;
    }
    this.lastSweep = now;

    let dropped = 0;
    for (const [sessionId, session] of [...this.sessions]) {
      if (this.isIdle(session)) {
        this.dropSession(sessionId, session);
        dropped++;
      }
    }
    return dropped;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const sessionId of [...this.sessions.keys()]) {
      this.clearSession(sessionId);
    }
  }

  stats(): FrameChannelStats {
    let subscribers = 0;
    for (const session of this.sessions.values()) {
      subscribers += session.subscribers.size;
    }
    return {
      sessions: this.sessions.size,
      subscribers,
      published: this.publishedCount,
      stale: this.staleCount,
      pruned: this.prunedCount,
    };
  }

  private session(sessionId: string): SessionFrames {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = { slot: new LatestSlot<Frame>(), subscribers: new Set(), touchedAt: this.now() };
      this.sessions.set(sessionId, session);
    }
    return session;
  }

  private isIdle(session: SessionFrames): boolean {
    return session.subscribers.size === 0 && this.now() - session.touchedAt >= this.idleSessionMs;
  }

  private dropSession(sessionId: string, session: SessionFrames): void {
    if (this.sessions.get(sessionId) !== session) {
      return;
    }
    this.sessions.delete(sessionId);
    session.slot.close();
    this.prunedCount++;
    this.log.debug('Idle frame session dropped', { sessionId });
  }
}
