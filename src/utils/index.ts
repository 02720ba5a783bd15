/**
 * Utility Functions
 */

import consola from 'consola';
import { v4 as uuidv4 } from 'uuid';

/**
 * Engine-wide logger
 */
export const logger = consola.withTag('hookshot');

/**
 * Raise the log level to debug (4) or put it back to info (3)
 */
export function setDebugLogging(enabled: boolean): void {
  logger.level = enabled ? 4 : 3;
}

/**
 * Generate a unique session ID
 */
export function generateSessionId(): string {
  return uuidv4();
}

/**
 * Keeps only the last `limit` bytes written to it
 */
export class TailBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  private dropped = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    if (chunk.length >= this.limit) {
      this.dropped = this.dropped || this.size > 0 || chunk.length > this.limit;
      this.chunks = [chunk.subarray(chunk.length - this.limit)];
      this.size = this.limit;
      return;
    }

    this.chunks.push(chunk);
    this.size += chunk.length;

    while (this.size > this.limit) {
      const head = this.chunks[0];
      if (head === undefined) break;
      const excess = this.size - this.limit;
      if (head.length <= excess) {
        this.chunks.shift();
        this.size -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.size -= excess;
      }
      this.dropped = true;
    }
  }

  /** Whether earlier output was discarded */
  get truncated(): boolean {
    return this.dropped;
  }

  toString(): string {
    const data = Buffer.concat(this.chunks);
    if (!this.dropped) return data.toString('utf-8');

    // The cut may land inside a multi-byte character; skip its continuation bytes
    let start = 0;
    while (start < 3 && start < data.length && (data[start] & 0xc0) === 0x80) {
      start++;
    }
    return data.subarray(start).toString('utf-8');
  }
}
