import { COLOR_SCHEMES, type ColorId, type ColorSchemeName } from '../types/config';
import { clamp01 } from './audioUtils';

type ColorRule = (level: number, position: number) => ColorId;

// Pick the colour of the first threshold the value falls under
function steps(value: number, thresholds: readonly number[], colors: readonly ColorId[]): ColorId {
  for (let i = 0; i < thresholds.length; i++) {
    if (value < thresholds[i]) return colors[i];
  }
  return colors[colors.length - 1];
}

const SCHEMES: Record<ColorSchemeName, ColorRule> = {
  // Level and position blended for variation
  multicolor: (level, position) => steps(level * 0.5 + position * 0.5, [0.33, 0.66], ['green', 'yellow', 'red']),
  blue: (level) => steps(level, [0.3, 0.7], ['blue', 'cyan', 'white']),
  green: (level) => steps(level, [0.5], ['green', 'yellow']),
  red: (level) => steps(level, [0.5], ['yellow', 'red']),
  rainbow: (_level, position) => steps(position, [0.2, 0.4, 0.6, 0.8], ['red', 'yellow', 'green', 'cyan', 'blue']),
  fire: (level) => steps(level, [0.3, 0.6], ['red', 'yellow', 'white']),
  prism: (_level, position) =>
    steps(position, [0.16, 0.32, 0.48, 0.64, 0.8], ['red', 'yellow', 'green', 'cyan', 'blue', 'magenta']),
  heat: (level) => steps(level, [0.25, 0.5, 0.75], ['blue', 'green', 'yellow', 'red']),
  ocean: (_level, position) => steps(position, [0.33, 0.66], ['cyan', 'blue', 'white']),
};

/**
 * Maps a normalized level and horizontal position to a colour slot.
 * Pure: the same inputs always give the same colour.
 */
export function getColor(level: number, position: number, scheme: ColorSchemeName): ColorId {
  return SCHEMES[scheme](clamp01(level), clamp01(position));
}

export function schemeAt(index: number): ColorSchemeName {
  const count = COLOR_SCHEMES.length;
  return COLOR_SCHEMES[((Math.trunc(index) % count) + count) % count];
}

export type ColorFn = (level: number, position: number) => ColorId;

export function colorFnFor(scheme: ColorSchemeName): ColorFn {
  return (level, position) => getColor(level, position, scheme);
}
