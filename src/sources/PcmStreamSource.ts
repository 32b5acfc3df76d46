import type { Readable } from 'node:stream';
import type { AudioChunk, AudioSource, AudioSourceHandlers } from '../types/audio';
import { DEFAULT_AUDIO_CONFIG } from '../types/config';

const BYTES_PER_SAMPLE = 2;
const INT16_SCALE = 32768;

export interface PcmStreamOptions {
  sampleRate?: number;
  chunkSize?: number; // samples per emitted chunk
}

/**
 * Signed 16-bit little-endian mono PCM from any readable stream, e.g. stdin
 * fed by `parec`, `arecord` or `sox`. Incoming bytes are regrouped into
 * fixed-size chunks; a trailing odd byte waits for the next read.
 */
export class PcmStreamSource implements AudioSource {
  public readonly type = 'stdin' as const;
  private readonly sampleRate: number;
  private readonly chunkSize: number;
  private pending: Buffer = Buffer.alloc(0);
  private detach: (() => void) | null = null;

  constructor(
    private readonly stream: Readable,
    options: PcmStreamOptions = {}
  ) {
    this.sampleRate = options.sampleRate ?? DEFAULT_AUDIO_CONFIG.sampleRate;
    this.chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_AUDIO_CONFIG.chunkSize);
  }

  // Splits raw bytes into as many complete chunks as they hold
  public consume(data: Buffer): AudioChunk[] {
    this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, data]) : data;
    const chunkBytes = this.chunkSize * BYTES_PER_SAMPLE;
    const chunks: AudioChunk[] = [];

    let offset = 0;
    while (this.pending.length - offset >= chunkBytes) {
      const samples = new Float32Array(this.chunkSize);
      for (let i = 0; i < this.chunkSize; i++) {
        samples[i] = this.pending.readInt16LE(offset + i * BYTES_PER_SAMPLE) / INT16_SCALE;
      }
      chunks.push({ samples, sampleRate: this.sampleRate });
      offset += chunkBytes;
    }
    this.pending = this.pending.subarray(offset);
    return chunks;
  }

  public get bufferedBytes(): number {
    return this.pending.length;
  }

  public start({ onChunk, onEnd, onError }: AudioSourceHandlers): void {
    if (this.detach) return;

    const handleData = (data: Buffer | string) => {
      const bytes = typeof data === 'string' ? Buffer.from(data, 'binary') : data;
      for (const chunk of this.consume(bytes)) onChunk(chunk);
    };
    const handleEnd = () => onEnd?.();
    const handleError = (error: Error) => onError?.(error);

    this.stream.on('data', handleData);
    this.stream.once('end', handleEnd);
    this.stream.once('error', handleError);
    this.detach = () => {
      this.stream.off('data', handleData);
      this.stream.off('end', handleEnd);
      this.stream.off('error', handleError);
    };
  }

  public stop(): void {
    this.detach?.();
    this.detach = null;
    this.stream.pause();
    this.pending = Buffer.alloc(0);
  }
}
