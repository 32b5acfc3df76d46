import { Color } from 'three';
import type { ColorId } from '../types/config';
import type { CharGrid } from './CharGrid';

export const RESET = '\x1b[0m';
export const HIDE_CURSOR = '\x1b[?25l';
export const SHOW_CURSOR = '\x1b[?25h';
export const ALT_SCREEN = '\x1b[?1049h';
export const MAIN_SCREEN = '\x1b[?1049l';
export const ERASE = '\x1b[2J\x1b[H';

export const goTo = (row: number, col: number) => `\x1b[${row};${col}H`;
export const fg = (rgb: readonly [number, number, number]) => `\x1b[38;2;${rgb[0]};${rgb[1]};${rgb[2]}m`;

export type Palette = Record<ColorId, string>;

// Bright terminal-style slots
export const DEFAULT_PALETTE: Palette = {
  blue: '#4f7cff',
  cyan: '#3fd7e8',
  green: '#46d36a',
  yellow: '#f2d443',
  red: '#f0504a',
  magenta: '#d061e8',
  white: '#e8e8e8',
};

const DIM_SCALE = 0.45;

type Rgb = [number, number, number];

function toRgb(color: Color): Rgb {
  const hex = color.getHex();
  return [(hex >> 16) & 0xff, (hex >> 8) & 0xff, hex & 0xff];
}

export interface Writable {
  write(chunk: string): unknown;
}

/**
 * Turns a CharGrid into ANSI escape sequences with 24-bit colour. Only the
 * rows that differ from the previous frame are rewritten.
 */
export class TerminalRenderer {
  private readonly codes = new Map<string, string>();
  private previousRows: string[] = [];
  private previousHeight = -1;
  private previousWidth = -1;

  constructor(palette: Partial<Palette> = {}) {
    const merged: Palette = { ...DEFAULT_PALETTE, ...palette };
    for (const [id, hex] of Object.entries(merged)) {
      const color = new Color(hex);
      this.codes.set(`${id}:0`, fg(toRgb(color)));
      this.codes.set(`${id}:1`, fg(toRgb(color.clone().multiplyScalar(DIM_SCALE))));
    }
  }

  // Colour escape for a cell style, empty for the terminal default
  public styleCode(color: ColorId | null, dim: boolean): string {
    if (color === null) return dim ? '\x1b[2m' : '';
    return this.codes.get(`${color}:${dim ? 1 : 0}`) ?? '';
  }

  public encodeRow(grid: CharGrid, row: number): string {
    let out = '';
    let style: string | null = null;
    for (let col = 0; col < grid.width; col++) {
      const cell = grid.cellAt(row, col);
      if (!cell) continue;
      const next = this.styleCode(cell.color, cell.dim);
      if (next !== style) {
        out += RESET + next;
        style = next;
      }
      out += cell.glyph;
    }
    return out + RESET;
  }

  // Escape sequence that brings the screen up to date with `grid`
  public render(grid: CharGrid): string {
    let out = '';
    if (grid.height !== this.previousHeight || grid.width !== this.previousWidth) {
      out += ERASE;
      this.previousRows = [];
      this.previousHeight = grid.height;
      this.previousWidth = grid.width;
    }

    for (let row = 0; row < grid.height; row++) {
      const encoded = this.encodeRow(grid, row);
      if (this.previousRows[row] === encoded) continue;
      this.previousRows[row] = encoded;
      out += goTo(row + 1, 1) + encoded;
    }
    return out;
  }

  public present(grid: CharGrid, stream: Writable): void {
    const frame = this.render(grid);
    if (frame.length > 0) stream.write(frame);
  }

  // Forces the next frame to repaint everything
  public invalidate(): void {
    this.previousRows = [];
    this.previousHeight = -1;
    this.previousWidth = -1;
  }

  public enter(stream: Writable): void {
    this.invalidate();
    stream.write(HIDE_CURSOR + ALT_SCREEN + ERASE);
  }

  public restore(stream: Writable): void {
    stream.write(RESET + SHOW_CURSOR + MAIN_SCREEN);
  }
}
