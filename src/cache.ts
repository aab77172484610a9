import { ConfigError } from "./errors.js";
import type { CacheStats } from "./types.js";

export interface BoundedCacheOptions {
  maxSize: number;
  ttlSeconds: number;
  now?: () => number;
}

interface CacheNode<V> {
  key: string;
  value: V;
  createdAt: number;
  expiresAt: number;
  // eviction queue links; head is the longest-resident entry
  prev: CacheNode<V> | null;
  next: CacheNode<V> | null;
}

/**
 * Key for one analysis: `owner/repo#number`. Slugs are case-insensitive on
 * GitHub and never contain `#`.
 */
export function buildCacheKey(repo: string, issueNumber: number): string {
  return `${repo.trim().toLowerCase()}#${issueNumber}`;
}

/**
 * In-memory key/value store bounded by entry count and per-entry TTL.
 *
 * Expiry is lazy: an expired entry is dropped when it is read, or swept when a
 * new key needs room. Overflow evicts in FIFO order, held in an explicit linked
 * queue. Re-setting a live key replaces its value and TTL but keeps its place in
 * the queue.
 *
 * Every method is synchronous, so within one process no two operations can
 * interleave; callers do their network I/O before `set`, never inside it.
 */
export class BoundedCache<V> {
  private entries = new Map<string, CacheNode<V>>();
  private head: CacheNode<V> | null = null;
  private tail: CacheNode<V> | null = null;
  private maxSize: number;
  private ttlMs: number;
  private clock: () => number;

  constructor(options: BoundedCacheOptions) {
    const problems: string[] = [];
    if (!Number.isInteger(options.maxSize) || options.maxSize <= 0) {
      problems.push(`MAX_CACHE_SIZE must be a positive integer, got ${options.maxSize}`);
    }
    if (!Number.isInteger(options.ttlSeconds) || options.ttlSeconds <= 0) {
      problems.push(`CACHE_TTL must be a positive integer, got ${options.ttlSeconds}`);
    }
    if (problems.length > 0) throw new ConfigError(problems);

    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlSeconds * 1000;
    this.clock = options.now ?? Date.now;
  }

  get ttlSeconds(): number {
    return this.ttlMs / 1000;
  }

  get capacity(): number {
    return this.maxSize;
  }

  /** Number of live (unexpired) entries. */
  get size(): number {
    const now = this.clock();
    let count = 0;
    for (let node = this.head; node; node = node.next) {
      if (!this.isExpired(node, now)) count++;
    }
    return count;
  }

  private isExpired(node: CacheNode<V>, now: number): boolean {
    return now >= node.expiresAt;
  }

  private unlink(node: CacheNode<V>): void {
    if (node.prev) node.prev.next = node.next;
    else this.head = node.next;
    if (node.next) node.next.prev = node.prev;
    else this.tail = node.prev;
    node.prev = null;
    node.next = null;
    this.entries.delete(node.key);
  }

  private append(node: CacheNode<V>): void {
    node.prev = this.tail;
    node.next = null;
    if (this.tail) this.tail.next = node;
    else this.head = node;
    this.tail = node;
    this.entries.set(node.key, node);
  }

  private sweepExpired(now: number): void {
    let node = this.head;
    while (node) {
      const next = node.next;
      if (this.isExpired(node, now)) this.unlink(node);
      node = next;
    }
  }

  get(key: string): V | undefined {
    const node = this.entries.get(key);
    if (!node) return undefined;
    if (this.isExpired(node, this.clock())) {
      this.unlink(node);
      return undefined;
    }
    return node.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: V): void {
    const now = this.clock();
    const existing = this.entries.get(key);

    if (existing && !this.isExpired(existing, now)) {
      existing.value = value;
      existing.createdAt = now;
      existing.expiresAt = now + this.ttlMs;
      return;
    }
    if (existing) this.unlink(existing);

    this.sweepExpired(now);
    while (this.entries.size >= this.maxSize && this.head) {
      this.unlink(this.head);
    }

    this.append({ key, value, createdAt: now, expiresAt: now + this.ttlMs, prev: null, next: null });
  }

  delete(key: string): boolean {
    const node = this.entries.get(key);
    if (!node) return false;
    this.unlink(node);
    return true;
  }

  /** Remove everything; returns how many entries were dropped. */
  clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    this.head = null;
    this.tail = null;
    return removed;
  }

  stats(): CacheStats {
    const now = this.clock();
    const keys: string[] = [];
    for (let node = this.head; node; node = node.next) {
      if (!this.isExpired(node, now)) keys.push(node.key);
    }
    return {
      size: keys.length,
      max_size: this.maxSize,
      ttl_seconds: this.ttlSeconds,
      keys,
    };
  }
}
