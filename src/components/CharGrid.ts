import type { ColorId } from '../types/config';

export const BLANK = ' ';

export interface Cell {
  glyph: string;
  color: ColorId | null;
  dim: boolean;
}

export interface Rect {
  row: number;
  col: number;
  height: number;
  width: number;
}

export interface BarOptions {
  ascii?: boolean;
  baseRow?: number; // row the bar grows up from, defaults to the bottom row
  glyphs?: readonly string[]; // overrides the tier glyphs, solid first
}

// Solid near the base, lighter towards the tip
const BLOCK_TIERS = ['█', '▓', '▒'] as const;
const ASCII_TIERS = ['#', '=', '-'] as const;

/**
 * Fixed-size character grid with a colour per cell. Every write is bounds
 * checked; anything that lands outside the grid is dropped.
 */
export class CharGrid {
  private glyphs: string[] = [];
  private colors: (ColorId | null)[] = [];
  private dims: boolean[] = [];
  private _height = 0;
  private _width = 0;

  constructor(height: number, width: number) {
    this.resize(height, width);
  }

  public get height(): number {
    return this._height;
  }

  public get width(): number {
    return this._width;
  }

  // Reallocates and clears when the size changes; returns whether it did
  public resize(height: number, width: number): boolean {
    const h = Math.max(0, Math.floor(height));
    const w = Math.max(0, Math.floor(width));
    if (h === this._height && w === this._width && this.glyphs.length === h * w) return false;
    this._height = h;
    this._width = w;
    this.glyphs = new Array<string>(h * w).fill(BLANK);
    this.colors = new Array<ColorId | null>(h * w).fill(null);
    this.dims = new Array<boolean>(h * w).fill(false);
    return true;
  }

  public inBounds(row: number, col: number): boolean {
    return row >= 0 && row < this._height && col >= 0 && col < this._width;
  }

  private indexOf(row: number, col: number): number {
    const r = Math.floor(row);
    const c = Math.floor(col);
    return this.inBounds(r, c) ? r * this._width + c : -1;
  }

  public put(row: number, col: number, glyph: string, color: ColorId | null, dim: boolean = false): boolean {
    const index = this.indexOf(row, col);
    if (index < 0) return false;
    this.glyphs[index] = glyph;
    this.colors[index] = color;
    this.dims[index] = dim;
    return true;
  }

  // Writes only into blank cells so decorations never cover content
  public overlay(row: number, col: number, glyph: string, color: ColorId | null, dim: boolean = false): boolean {
    const index = this.indexOf(row, col);
    if (index < 0 || this.glyphs[index] !== BLANK) return false;
    return this.put(row, col, glyph, color, dim);
  }

  public isBlank(row: number, col: number): boolean {
    const index = this.indexOf(row, col);
    return index >= 0 && this.glyphs[index] === BLANK;
  }

  public cellAt(row: number, col: number): Cell | null {
    const index = this.indexOf(row, col);
    if (index < 0) return null;
    return { glyph: this.glyphs[index], color: this.colors[index], dim: this.dims[index] };
  }

  public clear(rect?: Rect): void {
    if (!rect) {
      this.glyphs.fill(BLANK);
      this.colors.fill(null);
      this.dims.fill(false);
      return;
    }
    const rowEnd = Math.min(this._height, rect.row + rect.height);
    const colEnd = Math.min(this._width, rect.col + rect.width);
    for (let r = Math.max(0, rect.row); r < rowEnd; r++) {
      for (let c = Math.max(0, rect.col); c < colEnd; c++) {
        const index = r * this._width + c;
        this.glyphs[index] = BLANK;
        this.colors[index] = null;
        this.dims[index] = false;
      }
    }
  }

  /**
   * Fills `floor(level · height)` cells of a column upward from `baseRow`.
   * The glyph tier follows the cell's relative position inside the filled span;
   * `colorAt` receives that same relative position (0 at the base, 1 at the tip).
   * Returns the number of filled cells.
   */
  public drawVerticalBar(
    col: number,
    level: number,
    height: number,
    colorAt: (relative: number) => ColorId,
    options: BarOptions = {}
  ): number {
    const filled = Math.max(0, Math.min(height, Math.floor(Math.max(0, level) * height)));
    const baseRow = options.baseRow ?? this._height - 1;
    const tiers = options.glyphs ?? (options.ascii ? ASCII_TIERS : BLOCK_TIERS);

    for (let step = 0; step < filled; step++) {
      const relative = (step + 1) / filled;
      this.put(baseRow - step, col, tiers[barTier(relative, filled, tiers.length)], colorAt(relative));
    }
    return filled;
  }

  // Plain-text dump, one string per row
  public rows(): string[] {
    const out: string[] = [];
    for (let r = 0; r < this._height; r++) {
      out.push(this.glyphs.slice(r * this._width, (r + 1) * this._width).join(''));
    }
    return out;
  }
}

// Short bars stay solid; taller ones fade over their top quarter
export function barTier(relative: number, filled: number, tierCount: number): number {
  if (filled < 3 || tierCount < 2) return 0;
  if (relative <= 0.75) return 0;
  if (relative <= 0.9 || tierCount < 3) return 1;
  return 2;
}
