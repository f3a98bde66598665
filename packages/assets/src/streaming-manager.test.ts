import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { AssetManager } from './asset-manager.js';
import { AssetNotFoundError, InvalidArgumentError } from './errors.js';
import { TextAssetType, TextLoader } from './loaders/index.js';
import type { TextAsset } from './loaders/index.js';
import { StreamingManager } from './streaming-manager.js';
import type { StreamingError } from './streaming-manager.js';
import { CachePolicy } from './types.js';
import type { AssetLoadContext } from './types.js';

/** TextLoader whose async path waits until the test opens the gate. */
class GatedTextLoader extends TextLoader {
  private open: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.open = resolve;
  });
  private entered: () => void = () => undefined;
  readonly started = new Promise<void>((resolve) => {
    this.entered = resolve;
  });

  release(): void {
    this.open();
  }

  override async loadAsync(data: Uint8Array, context: AssetLoadContext): Promise<TextAsset> {
    this.entered();
    await this.gate;
    return this.load(data, context);
  }
}

describe('StreamingManager', () => {
  let root: string;
  let manager: AssetManager;
  let streaming: StreamingManager;
  let created: Array<{ streaming: StreamingManager; manager: AssetManager }> = [];

  function writeAsset(path: string, contents: string): void {
    writeFileSync(join(root, path), contents);
  }

  function setup(cachePolicy: CachePolicy, loader: TextLoader = new TextLoader()): void {
    manager = new AssetManager({ rootPath: root, cachePolicy });
    manager.registerLoader(loader);
    streaming = new StreamingManager(manager);
    created.push({ streaming, manager });
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'stockpile-streaming-'));
    setup(CachePolicy.LRU);
  });

  afterEach(() => {
    for (const pair of created) {
      pair.streaming.dispose();
      pair.manager.dispose();
    }
    created = [];
    rmSync(root, { recursive: true, force: true });
  });

  it('streams every queued asset and completes once', async () => {
    setup(CachePolicy.Aggressive);
    for (const name of ['a', 'b', 'c']) {
      writeAsset(`${name}.txt`, name);
    }
    const streamed = vi.fn();
    const complete = vi.fn();
    streaming.on('assetStreamed', streamed);
    streaming.on('streamingComplete', complete);

    expect(streaming.queueMany(TextAssetType, ['a.txt', 'b.txt', 'c.txt'])).toBe(3);
    expect(streaming.queuedCount).toBe(3);
    expect(streaming.progress).toBe(0);

    streaming.start(2);
    expect(streaming.isStreaming).toBe(true);
    await streaming.waitForCompletionAsync();

    expect(streaming.progress).toBe(1);
    expect(streaming.isStreaming).toBe(false);
    expect(streamed).toHaveBeenCalledTimes(3);
    expect(complete).toHaveBeenCalledTimes(1);
    expect(streaming.streamedCount).toBe(3);
    expect(manager.getLoadedPaths().sort()).toEqual(['a.txt', 'b.txt', 'c.txt']);
    expect(manager.getAssetInfo('b.txt')?.refCount).toBe(1);
  });

  it('releaseStreamed lets the cache policy reclaim the assets', async () => {
    setup(CachePolicy.Aggressive);
    writeAsset('a.txt', 'a');
    streaming.queue(TextAssetType, 'a.txt');
    streaming.start();
    await streaming.waitForCompletionAsync();

    streaming.releaseStreamed();
    expect(streaming.streamedCount).toBe(0);
    expect(manager.isLoaded('a.txt')).toBe(false);
  });

  it('skips assets that are already loaded', () => {
    writeAsset('a.txt', 'a');
    manager.load(TextAssetType, 'a.txt');
    expect(streaming.queue(TextAssetType, 'A.txt')).toBe(false);
    expect(streaming.queuedCount).toBe(0);
  });

  it('rejects empty paths', () => {
    expect(() => streaming.queue(TextAssetType, '')).toThrow(InvalidArgumentError);
  });

  it('reports failures and keeps going', async () => {
    writeAsset('a.txt', 'a');
    const errors: StreamingError[] = [];
    const complete = vi.fn();
    streaming.on('streamingError', (error) => errors.push(error));
    streaming.on('streamingComplete', complete);

    streaming.queueMany(TextAssetType, ['missing.txt', 'a.txt']);
    streaming.start(1);
    await streaming.waitForCompletionAsync();

    expect(errors).toHaveLength(1);
    expect(errors[0]?.path).toBe('missing.txt');
    expect(errors[0]?.error).toBeInstanceOf(AssetNotFoundError);
    expect(manager.isLoaded('a.txt')).toBe(true);
    expect(complete).toHaveBeenCalledTimes(1);
    expect(streaming.progress).toBe(1);
  });

  it('completes immediately when started with nothing queued', () => {
    const complete = vi.fn();
    streaming.on('streamingComplete', complete);
    streaming.start();
    expect(complete).toHaveBeenCalledTimes(1);
    expect(streaming.isStreaming).toBe(false);
  });

  it('rejects an invalid worker count', () => {
    expect(() => streaming.start(0)).toThrow(InvalidArgumentError);
  });

  it('stop cancels without reporting errors or completion', async () => {
    const loader = new GatedTextLoader();
    setup(CachePolicy.LRU, loader);
    writeAsset('a.txt', 'a');
    writeAsset('b.txt', 'b');
    const errors = vi.fn();
    const complete = vi.fn();
    streaming.on('streamingError', errors);
    streaming.on('streamingComplete', complete);

    streaming.queueMany(TextAssetType, ['a.txt', 'b.txt']);
    streaming.start(1);
    await loader.started;
    expect(streaming.activeCount).toBe(1);
    expect(streaming.queuedCount).toBe(1);

    streaming.stop();
    await streaming.waitForCompletionAsync();
    loader.release();

    expect(streaming.isStreaming).toBe(false);
    expect(streaming.queuedCount).toBe(0);
    expect(streaming.streamedCount).toBe(0);
    expect(errors).not.toHaveBeenCalled();
    expect(complete).not.toHaveBeenCalled();
  });

  it('waitForCompletionAsync resolves when its signal aborts', async () => {
    const loader = new GatedTextLoader();
    setup(CachePolicy.LRU, loader);
    writeAsset('a.txt', 'a');
    streaming.queue(TextAssetType, 'a.txt');
    streaming.start();

    const controller = new AbortController();
    const waiting = streaming.waitForCompletionAsync(controller.signal);
    controller.abort();
    await waiting;

    expect(streaming.progress).toBeLessThan(1);
    loader.release();
    await streaming.waitForCompletionAsync();
    expect(streaming.progress).toBe(1);
  });

  it('clear drops queued items', () => {
    streaming.queue(TextAssetType, 'a.txt');
    streaming.clear();
    expect(streaming.queuedCount).toBe(0);
    expect(streaming.progress).toBe(1);
  });

  it('refuses new work after dispose', () => {
    streaming.dispose();
    expect(() => streaming.queue(TextAssetType, 'a.txt')).toThrow(InvalidArgumentError);
    expect(() => streaming.start()).toThrow(InvalidArgumentError);
  });
});
