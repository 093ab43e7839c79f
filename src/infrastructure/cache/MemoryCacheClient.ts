import { ICacheClient } from '../../core/interfaces/ICacheClient.js';

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

/**
 * In-process cache backend with per-entry expiry
 */
export class MemoryCacheClient implements ICacheClient {
  readonly name = 'memory';
  private entries: Map<string, MemoryEntry> = new Map();

  constructor(private now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}
