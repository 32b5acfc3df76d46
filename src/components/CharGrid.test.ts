import { describe, expect, it } from 'vitest';
import { BLANK, CharGrid, barTier } from './CharGrid';

describe('CharGrid', () => {
  it('starts blank', () => {
    expect(new CharGrid(2, 3).rows()).toEqual(['   ', '   ']);
  });

  it('drops writes outside the grid', () => {
    const grid = new CharGrid(2, 2);
    expect(grid.put(-1, 0, 'x', 'red')).toBe(false);
    expect(grid.put(0, 2, 'x', 'red')).toBe(false);
    expect(grid.put(2, 0, 'x', 'red')).toBe(false);
    expect(grid.rows()).toEqual(['  ', '  ']);
  });

  it('floors fractional coordinates', () => {
    const grid = new CharGrid(2, 2);
    grid.put(1.7, 0.2, 'x', 'red');
    expect(grid.cellAt(1, 0)).toEqual({ glyph: 'x', color: 'red', dim: false });
  });

  it('overlays only onto blank cells', () => {
    const grid = new CharGrid(1, 2);
    grid.put(0, 0, '#', 'green');
    expect(grid.overlay(0, 0, '.', 'white', true)).toBe(false);
    expect(grid.overlay(0, 1, '.', 'white', true)).toBe(true);
    expect(grid.rows()).toEqual(['#.']);
    expect(grid.cellAt(0, 1)?.dim).toBe(true);
  });

  it('clears a rectangle clipped to the grid', () => {
    const grid = new CharGrid(2, 3);
    for (let c = 0; c < 3; c++) {
      grid.put(0, c, 'a', 'red');
      grid.put(1, c, 'b', 'red');
    }
    grid.clear({ row: 1, col: 1, height: 5, width: 5 });
    expect(grid.rows()).toEqual(['aaa', 'b  ']);
    expect(grid.isBlank(1, 2)).toBe(true);
  });

  it('reallocates only when the size changes', () => {
    const grid = new CharGrid(2, 2);
    grid.put(0, 0, 'x', null);
    expect(grid.resize(2, 2)).toBe(false);
    expect(grid.cellAt(0, 0)?.glyph).toBe('x');
    expect(grid.resize(3, 4)).toBe(true);
    expect(grid.rows()).toEqual(['    ', '    ', '    ']);
  });

  it('fills floor(level · height) cells from the bottom', () => {
    const grid = new CharGrid(4, 1);
    const filled = grid.drawVerticalBar(0, 0.6, 4, () => 'green');
    expect(filled).toBe(2);
    expect(grid.rows()).toEqual([' ', ' ', '█', '█']);
  });

  it('shades the top of tall bars', () => {
    const grid = new CharGrid(10, 1);
    grid.drawVerticalBar(0, 1, 10, () => 'red');
    expect(grid.rows().join('')).toBe('▒▓▓███████');
  });

  it('uses ASCII tiers when asked', () => {
    const grid = new CharGrid(10, 1);
    grid.drawVerticalBar(0, 1, 10, () => 'red', { ascii: true });
    expect(grid.rows().join('')).toBe('-==#######');
  });

  it('passes the relative height to the colour callback', () => {
    const grid = new CharGrid(4, 1);
    const seen: number[] = [];
    grid.drawVerticalBar(0, 1, 4, (relative) => {
      seen.push(relative);
      return 'blue';
    });
    expect(seen).toEqual([0.25, 0.5, 0.75, 1]);
  });

  it('never writes a bar taller than the grid', () => {
    const grid = new CharGrid(3, 1);
    expect(grid.drawVerticalBar(0, 5, 3, () => 'red')).toBe(3);
    expect(grid.drawVerticalBar(0, -1, 3, () => 'red')).toBe(0);
    expect(BLANK).toBe(' ');
  });
});

describe('barTier', () => {
  it('keeps short bars solid', () => {
    expect(barTier(1, 2, 3)).toBe(0);
  });

  it('switches tiers at 0.75 and 0.9', () => {
    expect(barTier(0.75, 10, 3)).toBe(0);
    expect(barTier(0.8, 10, 3)).toBe(1);
    expect(barTier(0.9, 10, 3)).toBe(1);
    expect(barTier(0.95, 10, 3)).toBe(2);
  });
});
