/**
 * @fileoverview In-memory summary cache keyed by message id.
 *
 * No TTL and no eviction: an entry lives until `clear()` or process exit,
 * even if the message it describes changes.
 */

export class SummaryCache {
  private readonly entries = new Map<string, string>();

  get(messageId: string): string | undefined {
    return this.entries.get(messageId);
  }

  set(messageId: string, summary: string): void {
    this.entries.set(messageId, summary);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
