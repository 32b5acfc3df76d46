import { describe, expect, it } from 'vitest';
import { CharGrid } from './CharGrid';
import { ERASE, RESET, TerminalRenderer, fg, goTo } from './TerminalRenderer';

const palette = {
  blue: '#0000ff',
  cyan: '#00ffff',
  green: '#00ff00',
  yellow: '#ffff00',
  red: '#ff0000',
  magenta: '#ff00ff',
  white: '#ffffff',
};

class Sink {
  public chunks: string[] = [];
  write(chunk: string) {
    this.chunks.push(chunk);
    return true;
  }
}

describe('TerminalRenderer', () => {
  it('maps colour ids to 24-bit escapes', () => {
    const terminal = new TerminalRenderer(palette);
    expect(terminal.styleCode('red', false)).toBe(fg([255, 0, 0]));
    expect(terminal.styleCode(null, false)).toBe('');
  });

  it('darkens dim cells', () => {
    const terminal = new TerminalRenderer(palette);
    expect(terminal.styleCode('white', true)).not.toBe(terminal.styleCode('white', false));
    expect(terminal.styleCode('white', true)).toMatch(/^\x1b\[38;2;\d+;\d+;\d+m$/);
  });

  it('emits a style change only where the style changes', () => {
    const terminal = new TerminalRenderer(palette);
    const grid = new CharGrid(1, 3);
    grid.put(0, 0, 'a', 'red');
    grid.put(0, 1, 'b', 'red');
    grid.put(0, 2, 'c', 'blue');
    expect(terminal.encodeRow(grid, 0)).toBe(
      RESET + fg([255, 0, 0]) + 'ab' + RESET + fg([0, 0, 255]) + 'c' + RESET
    );
  });

  it('repaints everything on the first frame and only changed rows after', () => {
    const terminal = new TerminalRenderer(palette);
    const grid = new CharGrid(2, 2);
    const first = terminal.render(grid);
    expect(first.startsWith(ERASE)).toBe(true);
    expect(first).toContain(goTo(1, 1));
    expect(first).toContain(goTo(2, 1));

    expect(terminal.render(grid)).toBe('');

    grid.put(1, 0, 'x', 'green');
    const update = terminal.render(grid);
    expect(update).toBe(goTo(2, 1) + terminal.encodeRow(grid, 1));
  });

  it('repaints fully after a resize', () => {
    const terminal = new TerminalRenderer(palette);
    const grid = new CharGrid(2, 2);
    terminal.render(grid);
    grid.resize(3, 2);
    expect(terminal.render(grid).startsWith(ERASE)).toBe(true);
  });

  it('writes nothing when the screen is up to date', () => {
    const terminal = new TerminalRenderer(palette);
    const grid = new CharGrid(1, 1);
    const sink = new Sink();
    terminal.present(grid, sink);
    terminal.present(grid, sink);
    expect(sink.chunks).toHaveLength(1);
  });

  it('enters and leaves the alternate screen', () => {
    const terminal = new TerminalRenderer(palette);
    const sink = new Sink();
    terminal.enter(sink);
    terminal.restore(sink);
    expect(sink.chunks[0]).toBe('\x1b[?25l\x1b[?1049h' + ERASE);
    expect(sink.chunks[1]).toBe(RESET + '\x1b[?25h\x1b[?1049l');
  });
});
