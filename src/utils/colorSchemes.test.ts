import { describe, expect, it } from 'vitest';
import { COLOR_SCHEMES } from '../types/config';
import { colorFnFor, getColor, schemeAt } from './colorSchemes';

describe('getColor', () => {
  it('blends level and position for multicolor', () => {
    expect(getColor(0, 0, 'multicolor')).toBe('green');
    expect(getColor(1, 0, 'multicolor')).toBe('yellow');
    expect(getColor(1, 1, 'multicolor')).toBe('red');
  });

  it('follows level for level-driven schemes', () => {
    expect(getColor(0.1, 0.9, 'blue')).toBe('blue');
    expect(getColor(0.5, 0.9, 'blue')).toBe('cyan');
    expect(getColor(0.8, 0.9, 'blue')).toBe('white');
    expect(getColor(0.2, 0, 'heat')).toBe('blue');
    expect(getColor(0.9, 0, 'heat')).toBe('red');
  });

  it('follows position for position-driven schemes', () => {
    expect(getColor(1, 0, 'rainbow')).toBe('red');
    expect(getColor(0, 1, 'rainbow')).toBe('blue');
    expect(getColor(0, 1, 'prism')).toBe('magenta');
    expect(getColor(0, 0.5, 'ocean')).toBe('blue');
  });

  it('clamps out-of-range input', () => {
    expect(getColor(-4, 2, 'fire')).toBe(getColor(0, 1, 'fire'));
    expect(getColor(7, -1, 'fire')).toBe('white');
  });

  it('is a pure function of its inputs', () => {
    for (const scheme of COLOR_SCHEMES) {
      expect(getColor(0.42, 0.17, scheme)).toBe(getColor(0.42, 0.17, scheme));
    }
  });
});

describe('schemeAt', () => {
  it('wraps indices in both directions', () => {
    expect(schemeAt(0)).toBe('multicolor');
    expect(schemeAt(COLOR_SCHEMES.length)).toBe('multicolor');
    expect(schemeAt(-1)).toBe('ocean');
  });
});

describe('colorFnFor', () => {
  it('binds a scheme', () => {
    expect(colorFnFor('green')(0.7, 0)).toBe('yellow');
  });
});
