// src/stores/audioStore.ts
import { createStore } from 'zustand/vanilla';
import type { AudioChunk, AudioSourceType } from '../types/audio';
import { DEFAULT_AUDIO_CONFIG } from '../types/config';
import { AudioQueue } from '../utils/AudioQueue';

export type AudioStatus = 'idle' | 'running' | 'ended' | 'error';

interface AudioStoreState {
  // State
  sourceType: AudioSourceType;
  status: AudioStatus;
  error: string | null;
  chunksReceived: number;
  droppedChunks: number;
  lastSampleRate: number;

  // Actions
  setSource: (type: AudioSourceType) => void;
  setStatus: (status: AudioStatus, error?: string | null) => void;
  pushChunk: (chunk: AudioChunk) => void;
  takeLatest: () => AudioChunk | null;
  reset: () => void;
}

/**
 * Producer side pushes chunks, the frame loop takes only the newest one.
 * The queue lives outside the reactive state; only counters are published.
 */
export function createAudioStore(capacity: number = DEFAULT_AUDIO_CONFIG.queueCapacity) {
  const queue = new AudioQueue(capacity);

  return createStore<AudioStoreState>()((set) => ({
    sourceType: 'demo',
    status: 'idle',
    error: null,
    chunksReceived: 0,
    droppedChunks: 0,
    lastSampleRate: DEFAULT_AUDIO_CONFIG.sampleRate,

    setSource: (type) => set({ sourceType: type }),

    setStatus: (status, error = null) => set({ status, error }),

    pushChunk: (chunk) => {
      queue.push(chunk);
      set((state) => ({
        chunksReceived: state.chunksReceived + 1,
        droppedChunks: queue.droppedCount,
        lastSampleRate: chunk.sampleRate,
      }));
    },

    takeLatest: () => queue.takeLatest(),

    reset: () => {
      queue.clear();
      set({ status: 'idle', error: null, chunksReceived: 0 });
    },
  }));
}

export type AudioStore = ReturnType<typeof createAudioStore>;
