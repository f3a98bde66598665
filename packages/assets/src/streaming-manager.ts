/**
 * Background bulk preloading on top of
 * AssetManager.loadAsync().
 *
 * Paths are queued, then drained by a bounded pool of workers. Streamed
 * assets stay resident: the manager keeps one handle per streamed path until
 * releaseStreamed() or dispose().
 */

import { EventBus, createLogger } from '@stockpile/core';

import type { AssetHandle } from './asset-handle.js';
import type { AssetManager } from './asset-manager.js';
import type { AssetType } from './asset-type.js';
import { InvalidArgumentError, isAssetError, toError } from './errors.js';
import { assetKey } from './paths.js';
import { LoadPriority } from './types.js';

const log = createLogger('StreamingManager');

export const DEFAULT_STREAMING_CONCURRENCY = 4;

export interface StreamingError {
  readonly path: string;
  readonly error: Error;
}

export interface StreamingManagerEvents {
  /** One queued asset finished loading. Payload: path. */
  assetStreamed: string;
  /** One queued asset failed; the rest of the queue keeps going. */
  streamingError: StreamingError;
  /** The session's queue drained. Fires once per session. */
  streamingComplete: undefined;
}

interface StreamItem {
  readonly type: AssetType<unknown>;
  readonly path: string;
}

interface StreamingSession {
  readonly controller: AbortController;
  readonly maxConcurrent: number;
  workers: number;
  active: number;
  total: number;
  completed: number;
  progress: number;
  stopped: boolean;
}

export class StreamingManager {
  private readonly events = new EventBus<StreamingManagerEvents>();
  private pending: StreamItem[] = [];
  private session: StreamingSession | null = null;
  private readonly streamed = new Map<string, AssetHandle<unknown>>();
  private readonly idleWaiters = new Set<() => void>();
  private disposed = false;

  constructor(private readonly manager: AssetManager) {}

  /** True from start() until every worker of the session has exited. */
  get isStreaming(): boolean {
    return this.session !== null;
  }

  /** Items waiting for a worker. */
  get queuedCount(): number {
    return this.pending.length;
  }

  /** Items a worker is loading right now. */
  get activeCount(): number {
    return this.session?.active ?? 0;
  }

  /** Handles held for streamed assets. */
  get streamedCount(): number {
    return this.streamed.size;
  }

  /**
   * 1 when nothing is queued or active; otherwise the fraction of the
   * session's items that have finished (never decreasing within a session).
   */
  get progress(): number {
    if (this.pending.length === 0 && this.activeCount === 0) return 1;
    const session = this.session;
    if (!session || session.total === 0) return 0;
    session.progress = Math.max(session.progress, Math.min(1, session.completed / session.total));
    return session.progress;
  }

  on<K extends keyof StreamingManagerEvents>(
    event: K,
    listener: (data: StreamingManagerEvents[K]) => void,
  ): () => void {
    return this.events.on(event, listener);
  }

  /**
   * Queue an asset for streaming. Assets that are already loaded are skipped.
   * Returns whether the path was queued.
   */
  queue<T>(type: AssetType<T>, path: string): boolean {
    this.assertUsable();
    if (typeof path !== 'string' || path.trim().length === 0) {
      throw new InvalidArgumentError('path', 'expected a non-empty path');
    }
    if (this.manager.isLoaded(path)) return false;

    this.pending.push({ type, path });
    const session = this.session;
    if (session && !session.stopped) {
      session.total += 1;
      this.spawnWorkers(session);
    }
    return true;
  }

  /** Queue several assets of one type. Returns how many were queued. */
  queueMany<T>(type: AssetType<T>, paths: Iterable<string>): number {
    let queued = 0;
    for (const path of paths) {
      if (this.queue(type, path)) queued += 1;
    }
    return queued;
  }

  /** Begin draining the queue. No-op while a session is running. */
  start(maxConcurrent = DEFAULT_STREAMING_CONCURRENCY): void {
    this.assertUsable();
    if (this.session) return;
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new InvalidArgumentError('maxConcurrent', `expected an integer >= 1, got ${maxConcurrent}`);
    }

    const session: StreamingSession = {
      controller: new AbortController(),
      maxConcurrent,
      workers: 0,
      active: 0,
      total: this.pending.length,
      completed: 0,
      progress: 0,
      stopped: false,
    };
    this.session = session;
    log.debug(`streaming ${session.total} assets, ${maxConcurrent} at a time`);

    if (this.pending.length === 0) {
      this.finishSession(session);
      return;
    }
    this.spawnWorkers(session);
  }

  /** Cancel queued and in-flight work. Safe to call at any time. */
  stop(): void {
    this.pending = [];
    const session = this.session;
    if (session && !session.stopped) {
      session.stopped = true;
      session.controller.abort();
    }
    this.notifyIfIdle();
  }

  /** Drop everything still queued. */
  clear(): void {
    this.pending = [];
    this.notifyIfIdle();
  }

  /**
   * Wait until progress reaches 1 or the signal aborts. Never rejects.
   */
  waitForCompletionAsync(signal?: AbortSignal): Promise<void> {
    if (this.progress >= 1 || signal?.aborted) return Promise.resolve();

    return new Promise<void>((resolvePromise) => {
      const onAbort = (): void => {
        this.idleWaiters.delete(done);
        resolvePromise();
      };
      const done = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolvePromise();
      };
      this.idleWaiters.add(done);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Release the handles held for streamed assets. */
  releaseStreamed(): void {
    for (const handle of this.streamed.values()) {
      handle.release();
    }
    this.streamed.clear();
  }

  dispose(): void {
    if (this.disposed) return;
    this.stop();
    this.clear();
    this.releaseStreamed();
    this.disposed = true;
  }

  // ===========================================================================
  // Workers
  // ===========================================================================

  private spawnWorkers(session: StreamingSession): void {
    while (
      session.workers < session.maxConcurrent &&
      session.workers - session.active < this.pending.length
    ) {
      session.workers += 1;
      this.runWorker(session).catch((err: unknown) => {
        log.error('streaming worker stopped unexpectedly:', err);
      });
    }
  }

  private async runWorker(session: StreamingSession): Promise<void> {
    const signal = session.controller.signal;
    try {
      for (;;) {
        if (signal.aborted) break;
        const item = this.pending.shift();
        if (!item) break;

        session.active += 1;
        try {
          await this.streamItem(session, item);
        } finally {
          session.active -= 1;
        }
      }
    } finally {
      session.workers -= 1;
      if (session.workers === 0) {
        this.finishSession(session);
      }
    }
  }

  private async streamItem(session: StreamingSession, item: StreamItem): Promise<void> {
    const signal = session.controller.signal;
    try {
      const handle = await this.manager.loadAsync(item.type, item.path, {
        priority: LoadPriority.Streaming,
        signal,
      });
      this.retain(handle);
      session.completed += 1;
      this.events.emit('assetStreamed', handle.path);
    } catch (err) {
      if (isAssetError(err, 'Disposed')) {
        this.stop();
        return;
      }
      if (signal.aborted && isAssetError(err, 'Cancelled')) {
        return;
      }
      session.completed += 1;
      const error = toError(err);
      log.debug(`failed to stream "${item.path}":`, error.message);
      this.events.emit('streamingError', { path: item.path, error });
    }
  }

  private retain(handle: AssetHandle<unknown>): void {
    const key = assetKey(handle.path);
    if (this.streamed.has(key) || this.disposed) {
      handle.release();
      return;
    }
    this.streamed.set(key, handle);
  }

  private finishSession(session: StreamingSession): void {
    if (this.session !== session) return;
    this.session = null;
    if (!session.stopped) {
      this.events.emit('streamingComplete', undefined);
    }
    this.notifyIfIdle();
  }

  private notifyIfIdle(): void {
    if (this.progress < 1) return;
    const waiters = [...this.idleWaiters];
    this.idleWaiters.clear();
    for (const done of waiters) {
      done();
    }
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new InvalidArgumentError('streaming', 'the streaming manager is disposed');
    }
  }
}
