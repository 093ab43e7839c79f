/**
 * Key/value cache backend. Every method may reject; callers treat a rejection
 * as a miss (reads) or a no-op (writes).
 */
export interface ICacheClient {
  readonly name: string;

  get(key: string): Promise<string | null>;

  set(key: string, value: string, ttlSeconds: number): Promise<void>;

  /**
   * Deleting an absent key is not an error
   */
  delete(key: string): Promise<void>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}
