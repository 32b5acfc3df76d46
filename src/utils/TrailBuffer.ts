import type { GridSize } from '../types/audio';

export const TRAIL_DECAY = 0.85;
export const TRAIL_VISIBLE = 0.02;

const BLOCK_GLYPHS = ['·', '•', '✳', '✶'] as const;
const ASCII_GLYPHS = ['·', '.', '+', '*'] as const;

// Decaying 2D brightness grid; contributions merge by max so trails never flicker
export class TrailBuffer {
  private cells: Float32Array;
  private size: GridSize;

  constructor(size: GridSize) {
    this.size = { height: Math.max(0, size.height), width: Math.max(0, size.width) };
    this.cells = new Float32Array(this.size.height * this.size.width);
  }

  public get height(): number {
    return this.size.height;
  }

  public get width(): number {
    return this.size.width;
  }

  // Returns true when the buffer had to be reallocated
  public ensureSize(size: GridSize): boolean {
    if (size.height === this.size.height && size.width === this.size.width) return false;
    this.size = { height: Math.max(0, size.height), width: Math.max(0, size.width) };
    this.cells = new Float32Array(this.size.height * this.size.width);
    return true;
  }

  public decay(factor: number = TRAIL_DECAY): void {
    for (let i = 0; i < this.cells.length; i++) this.cells[i] *= factor;
  }

  public deposit(row: number, col: number, brightness: number): void {
    const r = Math.floor(row);
    const c = Math.floor(col);
    if (r < 0 || r >= this.size.height || c < 0 || c >= this.size.width) return;
    const index = r * this.size.width + c;
    this.cells[index] = Math.max(this.cells[index], Math.min(1, Math.max(0, brightness)));
  }

  public get(row: number, col: number): number {
    if (row < 0 || row >= this.size.height || col < 0 || col >= this.size.width) return 0;
    return this.cells[row * this.size.width + col];
  }

  public forEachVisible(fn: (row: number, col: number, brightness: number) => void): void {
    for (let r = 0; r < this.size.height; r++) {
      for (let c = 0; c < this.size.width; c++) {
        const b = this.cells[r * this.size.width + c];
        if (b > TRAIL_VISIBLE) fn(r, c, b);
      }
    }
  }
}

export function trailGlyph(brightness: number, ascii: boolean): string {
  const glyphs = ascii ? ASCII_GLYPHS : BLOCK_GLYPHS;
  if (brightness > 0.75) return glyphs[3];
  if (brightness > 0.5) return glyphs[2];
  if (brightness > 0.3) return glyphs[1];
  return glyphs[0];
}
