/**
 * Star/spark particles emitted from the grid centre.
 *
 * Each frame a broadband energy is taken from the bands (Gaussian-weighted
 * towards the lower mids) and followed by two envelopes: a slow "macro" one for
 * baseline liveliness and a fast one whose excess over the macro envelope marks
 * transients. Spawning follows both. While the instantaneous energy is below
 * the quiet threshold, at most one particle is emitted per quiet interval,
 * whatever the macro envelope holds.
 */
import type { GridSize, Particle } from '../types/audio';
import { clamp01, gaussianWeight, mean, positionOf } from './audioUtils';

export interface ParticleFieldConfig {
  maxParticles: number;
  maxSpawnPerFrame: number;
  macroSpawnRate: number;
  transientSpawnRate: number;
  macroAlpha: number;
  transientAlpha: number;
  transientHeadroom: number;
  quietThreshold: number;
  quietInterval: number; // frames between spawns while quiet
  drag: number;
  margin: number; // cells outside the grid a particle may drift before removal
  minAge: number;
  maxAge: number;
  weightCenter: number;
  weightWidth: number;
  verticalSquish: number; // terminal cells are about twice as tall as wide
}

export const DEFAULT_PARTICLE_CONFIG: ParticleFieldConfig = {
  maxParticles: 400,
  maxSpawnPerFrame: 60,
  macroSpawnRate: 18,
  transientSpawnRate: 60,
  macroAlpha: 0.05,
  transientAlpha: 0.5,
  transientHeadroom: 1.15,
  quietThreshold: 0.02,
  quietInterval: 22,
  drag: 0.96,
  margin: 2,
  minAge: 8,
  maxAge: 48,
  weightCenter: 0.3,
  weightWidth: 0.18,
  verticalSquish: 0.6,
};

export interface ParticleFrameStats {
  energy: number;
  macro: number;
  transient: number;
  shimmer: number;
  spawned: number;
}

const BLOCK_GLYPHS = ['·', '•', '✧', '✦'] as const;
const ASCII_GLYPHS = ['.', '.', '+', '*'] as const;

export class ParticleField {
  private live: Particle[] = [];
  private size: GridSize = { height: 0, width: 0 };
  private macro = 0;
  private fast = 0;
  private framesSinceSpawn: number;
  private nextId = 0;
  private readonly config: ParticleFieldConfig;
  private readonly random: () => number;

  constructor(config: Partial<ParticleFieldConfig> = {}, random: () => number = Math.random) {
    this.config = { ...DEFAULT_PARTICLE_CONFIG, ...config };
    this.random = random;
    // Allow one spawn on the very first quiet frame
    this.framesSinceSpawn = this.config.quietInterval;
  }

  public get particles(): readonly Particle[] {
    return this.live;
  }

  public get envelopes(): { macro: number; fast: number } {
    return { macro: this.macro, fast: this.fast };
  }

  public reset(): void {
    this.live = [];
    this.macro = 0;
    this.fast = 0;
    this.framesSinceSpawn = this.config.quietInterval;
  }

  // Emphasises the lower-mid region where most musical content sits
  public broadbandEnergy(bands: readonly number[]): number {
    if (bands.length === 0) return 0;
    let weighted = 0;
    let total = 0;
    for (let i = 0; i < bands.length; i++) {
      const w = gaussianWeight(positionOf(i, bands.length), this.config.weightCenter, this.config.weightWidth);
      weighted += w * bands[i];
      total += w;
    }
    return total > 0 ? clamp01(weighted / total) : 0;
  }

  public update(bands: readonly number[], size: GridSize): ParticleFrameStats {
    const cfg = this.config;
    this.resize({ height: Math.max(0, size.height), width: Math.max(0, size.width) });

    // Envelopes
    const energy = this.broadbandEnergy(bands);
    this.macro += cfg.macroAlpha * (energy - this.macro);
    this.fast += cfg.transientAlpha * (energy - this.fast);
    const transient = Math.max(0, this.fast - this.macro * cfg.transientHeadroom);
    const shimmer = bands.length > 0 ? mean(bands.slice(Math.floor(bands.length * 0.75))) : 0;

    this.advance();

    // Spawn
    let spawnCount: number;
    if (energy < cfg.quietThreshold) {
      spawnCount = this.framesSinceSpawn >= cfg.quietInterval ? 1 : 0;
    } else {
      spawnCount = Math.min(
        cfg.maxSpawnPerFrame,
        Math.floor(this.macro * cfg.macroSpawnRate + transient * cfg.transientSpawnRate)
      );
    }
    if (this.size.width <= 0 || this.size.height <= 0) spawnCount = 0;

    const burst = clamp01(transient * 4);
    for (let i = 0; i < spawnCount; i++) {
      this.live.push(this.spawn(shimmer, transient, burst));
    }
    this.framesSinceSpawn = spawnCount > 0 ? 1 : this.framesSinceSpawn + 1;

    // Oldest first
    if (this.live.length > cfg.maxParticles) {
      this.live.splice(0, this.live.length - cfg.maxParticles);
    }

    return { energy, macro: this.macro, transient, shimmer, spawned: spawnCount };
  }

  // Live particles keep their offset from the centre when the grid changes size
  private resize(next: GridSize): void {
    const dx = (next.width - this.size.width) / 2;
    const dy = (next.height - this.size.height) / 2;
    this.size = next;
    if (dx === 0 && dy === 0) return;
    for (const p of this.live) {
      p.x += dx;
      p.y += dy;
    }
  }

  private advance(): void {
    const { drag, margin } = this.config;
    const { height, width } = this.size;
    const survivors: Particle[] = [];
    for (const p of this.live) {
      p.vx *= drag;
      p.vy *= drag;
      p.x += p.vx;
      p.y += p.vy;
      p.age += 1;
      const inside = p.x >= -margin && p.x < width + margin && p.y >= -margin && p.y < height + margin;
      if (p.age < p.maxAge && inside) survivors.push(p);
    }
    this.live = survivors;
  }

  private spawn(shimmer: number, transient: number, burst: number): Particle {
    const cfg = this.config;
    const angle = this.random() * Math.PI * 2;
    const ux = Math.cos(angle);
    const uy = Math.sin(angle) * cfg.verticalSquish;
    const speed = (0.35 + this.macro * 1.1 + shimmer * 0.6 + transient * 2) * (0.6 + 0.8 * this.random());

    return {
      id: this.nextId++,
      x: this.size.width / 2,
      y: this.size.height / 2,
      vx: ux * speed,
      vy: uy * speed,
      age: 0,
      maxAge: this.lifetimeFor(ux, uy, speed),
      burst,
    };
  }

  // Frames needed to coast to the grid edge under drag, clamped to the configured range
  private lifetimeFor(ux: number, uy: number, speed: number): number {
    const { drag, minAge, maxAge } = this.config;
    const reachX = Math.abs(ux) > 1e-6 ? this.size.width / 2 / Math.abs(ux) : Infinity;
    const reachY = Math.abs(uy) > 1e-6 ? this.size.height / 2 / Math.abs(uy) : Infinity;
    const reach = Math.min(reachX, reachY);
    const remaining = 1 - (reach * (1 - drag)) / Math.max(1e-6, speed);
    if (!Number.isFinite(reach) || remaining <= 0) return maxAge;
    const frames = Math.ceil(Math.log(remaining) / Math.log(drag));
    return Math.min(maxAge, Math.max(minAge, frames));
  }
}

// Remaining life, a twinkle on age and position, and the burst boost
export function particleIntensity(p: Particle): number {
  const life = Math.max(0, 1 - p.age / p.maxAge);
  const twinkle = 0.6 + 0.4 * Math.sin(p.age * 0.6 + p.x * 0.2);
  return clamp01(life * twinkle + p.burst * 0.5 * life);
}

export function particleGlyph(intensity: number, ascii: boolean): string {
  const glyphs = ascii ? ASCII_GLYPHS : BLOCK_GLYPHS;
  if (intensity > 0.75) return glyphs[3];
  if (intensity > 0.5) return glyphs[2];
  if (intensity > 0.3) return glyphs[1];
  return glyphs[0];
}
