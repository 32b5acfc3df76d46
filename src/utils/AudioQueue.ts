import type { AudioChunk } from '../types/audio';

/**
 * Bounded hand-off between the audio producer and the render loop.
 * A full queue drops its oldest chunk; neither side ever waits.
 */
export class AudioQueue {
  private chunks: AudioChunk[] = [];
  private dropped = 0;
  public readonly capacity: number;

  constructor(capacity: number = 8) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  public push(chunk: AudioChunk): void {
    this.chunks.push(chunk);
    while (this.chunks.length > this.capacity) {
      this.chunks.shift();
      this.dropped++;
    }
  }

  // Most recent chunk or null; never waits. Older chunks are discarded.
  public takeLatest(): AudioChunk | null {
    const latest = this.chunks.length > 0 ? this.chunks[this.chunks.length - 1] : null;
    this.chunks = [];
    return latest;
  }

  public get size(): number {
    return this.chunks.length;
  }

  public get droppedCount(): number {
    return this.dropped;
  }

  public clear(): void {
    this.chunks = [];
  }
}
