import { createEqState, type EqState } from '../utils/adaptiveEq';
import { positionOf } from '../utils/audioUtils';
import { ParticleField, particleGlyph, particleIntensity } from '../utils/ParticleField';
import { TrailBuffer, trailGlyph } from '../utils/TrailBuffer';
import { analyzeBands } from './analysis';
import type { SceneDefinition } from './sceneTypes';

export interface RadialBurstState {
  kind: 'radial_burst';
  eq: EqState;
  trail: TrailBuffer;
  particles: ParticleField;
}

const MIN_WIDTH = 10;
const MIN_HEIGHT = 6;
const SPOKE_SQUISH = 0.6;

export function spokeCount(width: number, height: number): number {
  return Math.max(24, Math.min(120, Math.floor((width + height) * 0.8)));
}

// Radial spokes fading through a trail buffer, with star particles on top
export const radialBurstScene: SceneDefinition<RadialBurstState> = {
  id: 'radial_burst',
  name: 'Radial Burst',
  createState: ({ random }) => ({
    kind: 'radial_burst',
    eq: createEqState(),
    trail: new TrailBuffer({ height: 0, width: 0 }),
    particles: new ParticleField({}, random),
  }),
  render: (frame, state) => {
    const { grid, settings, color } = frame;
    const { height, width } = grid;
    if (width < MIN_WIDTH || height < MIN_HEIGHT) return;

    const spokes = spokeCount(width, height);
    const bands = analyzeBands(frame, spokes, state.eq);

    const trail = state.trail;
    trail.ensureSize({ height, width });
    trail.decay();

    const cx = Math.floor(width / 2);
    const cy = Math.floor(height / 2);
    const maxRadius = Math.floor(Math.min(width, height) / 2) - 1;
    if (maxRadius <= 0) return;

    bands.forEach((value, i) => {
      const radius = Math.floor(Math.pow(value, 0.6) * maxRadius);
      const angle = (i / spokes) * 2 * Math.PI;
      const dx = Math.cos(angle);
      const dy = Math.sin(angle) * SPOKE_SQUISH;
      for (let step = 0; step < radius; step++) {
        trail.deposit(Math.trunc(cy + dy * step), Math.trunc(cx + dx * step), 0.4 + 0.6 * (step / Math.max(1, radius - 1)));
      }
    });

    state.particles.update(bands, { height, width });

    trail.forEachVisible((row, col, brightness) => {
      grid.put(row, col, trailGlyph(brightness, settings.ascii), color(brightness, positionOf(col, width)));
    });

    for (const p of state.particles.particles) {
      const intensity = particleIntensity(p);
      grid.put(Math.floor(p.y), Math.floor(p.x), particleGlyph(intensity, settings.ascii), color(intensity, positionOf(p.x, width)));
    }
  },
};
