import type { BackgroundName } from '../types/config';
import type { ColorFn } from '../utils/colorSchemes';
import { positionOf } from '../utils/audioUtils';
import type { CharGrid } from './CharGrid';

const SHADES = [' ', '░', '▒', '▓', '█'] as const;
const ASCII_SHADES = [' ', '.', ':', '+', '#'] as const;

const STAR_COUNT = 120;
const STAR_GLYPHS = ['·', '·', '✦', '*'] as const;
const ASCII_STAR_GLYPHS = ['.', '.', '*', '*'] as const;

// Plain ASCII already, so the same art serves both glyph sets
const PALM_ART = [
  '__  _|_  __',
  '  \\/ | \\/  ',
  '     |     ',
  '     |     ',
  '     )     ',
  '     |     ',
  '     (     ',
  '     |     ',
  '   __|__   ',
] as const;

interface Star {
  x: number;
  y: number;
  glyph: number; // index into the glyph set
}

export interface BackgroundOptions {
  ascii: boolean;
  color: ColorFn;
}

/**
 * Decorations drawn after the mode has rendered. Every write goes through
 * `overlay`, so only blank cells are touched.
 */
export class BackgroundLayer {
  private stars: Star[] = [];
  private starsHeight = -1;
  private starsWidth = -1;
  private random: () => number;

  constructor(random: () => number = Math.random) {
    this.random = random;
  }

  public draw(grid: CharGrid, name: BackgroundName, options: BackgroundOptions): void {
    switch (name) {
      case 'none':
        return;
      case 'dots':
        this.drawDots(grid, options.ascii);
        return;
      case 'grid':
        this.drawGrid(grid, options.ascii);
        return;
      case 'gradient':
        this.drawGradient(grid, options);
        return;
      case 'stars':
        this.drawStars(grid, options.ascii);
        return;
      case 'palm':
        this.drawPalm(grid);
        return;
    }
  }

  public reset(): void {
    this.stars = [];
    this.starsHeight = -1;
    this.starsWidth = -1;
  }

  private drawDots(grid: CharGrid, ascii: boolean): void {
    const glyph = ascii ? '.' : '·';
    for (let y = 0; y < grid.height; y += 2) {
      for (let x = 0; x < grid.width; x += 2) {
        grid.overlay(y, x, glyph, 'white', true);
      }
    }
  }

  private drawGrid(grid: CharGrid, ascii: boolean): void {
    const glyph = ascii ? '.' : '·';
    for (let y = 0; y < grid.height; y++) {
      const isRow = y % 4 === 0;
      for (let x = 0; x < grid.width; x++) {
        if (isRow || x % 8 === 0) grid.overlay(y, x, glyph, 'white', true);
      }
    }
  }

  // Shade deepens towards the bottom row
  private drawGradient(grid: CharGrid, { ascii, color }: BackgroundOptions): void {
    const shades = ascii ? ASCII_SHADES : SHADES;
    for (let y = 0; y < grid.height; y++) {
      const t = positionOf(y, grid.height);
      const glyph = shades[Math.min(shades.length - 1, Math.floor(t * (shades.length - 1)))];
      if (glyph === ' ') continue;
      for (let x = 0; x < grid.width; x++) {
        grid.overlay(y, x, glyph, color(t * 0.8 + 0.2, positionOf(x, grid.width)), true);
      }
    }
  }

  private drawStars(grid: CharGrid, ascii: boolean): void {
    const { height, width } = grid;
    if (height === 0 || width === 0) return;
    if (height !== this.starsHeight || width !== this.starsWidth) {
      this.stars = Array.from({ length: STAR_COUNT }, () => ({
        x: Math.floor(this.random() * width),
        y: Math.floor(this.random() * height),
        glyph: Math.floor(this.random() * STAR_GLYPHS.length),
      }));
      this.starsHeight = height;
      this.starsWidth = width;
    }

    const glyphs = ascii ? ASCII_STAR_GLYPHS : STAR_GLYPHS;
    for (const star of this.stars) {
      // Slow drift right and down, wrapping at the edges
      if (this.random() < 0.12) star.x = (star.x + 1) % width;
      if (this.random() < 0.08) star.y = (star.y + 1) % height;
      grid.overlay(star.y, star.x, glyphs[star.glyph] ?? glyphs[0], 'white');
    }
  }

  // Left-aligned on narrow grids, left of centre on wide ones
  private drawPalm(grid: CharGrid): void {
    const left = grid.width < 60 ? 2 : Math.max(2, Math.floor(grid.width / 2) - 25);
    const top = Math.max(0, Math.floor(grid.height / 2) - Math.floor(PALM_ART.length / 2));
    PALM_ART.forEach((line, dy) => {
      [...line].forEach((glyph, dx) => {
        if (glyph !== ' ') grid.overlay(top + dy, left + dx, glyph, 'green');
      });
    });
  }
}
