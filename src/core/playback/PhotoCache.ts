/**
 * PhotoCache - decoded photos keyed by resource reference.
 *
 * LRU-bounded; evicted images go back through `ImageSource.release`.
 * Concurrent requests for the same photo share one decode. A photo that
 * failed to decode is reported once and not retried until `clear()`.
 */

import { LRUCache } from '../../utils/LRUCache';
import { Logger } from '../../utils/Logger';
import { errorMessage } from '../errors';
import type { ImageSource } from '../../render/DrawingSurface';
import type { ResourceRef } from '../types/timeline';

const log = new Logger('PhotoCache');

export type PhotoErrorHandler = (resourceRef: ResourceRef, error: unknown) => void;

export class PhotoCache<TImage> {
  private readonly cache: LRUCache<ResourceRef, TImage>;
  private readonly pending = new Map<ResourceRef, Promise<TImage | null>>();
  private readonly failed = new Set<ResourceRef>();
  // Bumped by clear() so decodes started earlier are dropped on arrival
  private generation = 0;

  constructor(
    private readonly source: ImageSource<TImage>,
    capacity: number,
    private readonly onError?: PhotoErrorHandler
  ) {
    this.cache = new LRUCache(capacity, (_ref, image) => this.source.release?.(image));
  }

  get size(): number {
    return this.cache.size;
  }

  /** Decoded image if ready; does not start a decode. */
  peek(resourceRef: ResourceRef): TImage | undefined {
    return this.cache.peek(resourceRef);
  }

  has(resourceRef: ResourceRef): boolean {
    return this.cache.has(resourceRef);
  }

  /** Decode `resourceRef` if needed. Resolves `null` on failure, never rejects. */
  ensure(resourceRef: ResourceRef): Promise<TImage | null> {
    const cached = this.cache.get(resourceRef);
    if (cached !== undefined) return Promise.resolve(cached);
    if (this.failed.has(resourceRef)) return Promise.resolve(null);

    const inFlight = this.pending.get(resourceRef);
    if (inFlight) return inFlight;

    const generation = this.generation;
    const request = this.source.load(resourceRef).then(
      (image) => {
        if (generation !== this.generation) {
          this.source.release?.(image);
          return null;
        }
        this.pending.delete(resourceRef);
        this.cache.set(resourceRef, image);
        return image;
      },
      (error: unknown) => {
        if (generation !== this.generation) return null;
        this.pending.delete(resourceRef);
        this.failed.add(resourceRef);
        log.error(`Failed to decode ${resourceRef}: ${errorMessage(error)}`);
        this.onError?.(resourceRef, error);
        return null;
      }
    );
    this.pending.set(resourceRef, request);
    return request;
  }

  /** Start decodes for `resourceRefs` without waiting for them. */
  preload(resourceRefs: readonly ResourceRef[]): void {
    for (const ref of resourceRefs) {
      void this.ensure(ref);
    }
  }

  /** Drop everything, releasing decoded images. */
  clear(): void {
    this.generation++;
    this.pending.clear();
    this.failed.clear();
    this.cache.clear();
  }
}
