import { beforeEach, describe, expect, it } from 'vitest';
import { Plane } from '../src/common/enums';
import { BufferPositionError, InvalidOptionError } from '../src/errors';
import { extendedFlagsFor } from '../src/tn5250-attributes';
import { TN5250ScreenBuffer } from '../src/tn5250-screen-buffer';
import { silentLogger } from './helpers';

describe('TN5250ScreenBuffer', () => {
  let buffer: TN5250ScreenBuffer;

  beforeEach(() => {
    buffer = new TN5250ScreenBuffer({
      rows: 24,
      columns: 80,
      logger: silentLogger(),
    });
  });

  it('starts blank with the default attribute', () => {
    expect(buffer.length).toBe(1920);
    expect(buffer.getChar(0)).toBe(' ');
    expect(buffer.getAttribute(1919)).toBe(0x20);
    expect(buffer.getExtended(1919)).toBe(0);
    expect(buffer.getRendererMarker(0)).toBe(0);
  });

  it('keeps the planes independent', () => {
    buffer.setChar(10, 'X');
    buffer.setRendererMarker(11, 7);

    expect(buffer.getAttribute(10)).toBe(0x20);
    expect(buffer.getRendererMarker(10)).toBe(0);
    expect(buffer.getChar(11)).toBe(' ');
    expect(buffer.getRendererMarker(11)).toBe(7);
  });

  it('disperses extended flags from the attribute code', () => {
    buffer.setAttribute(0, 36);
    buffer.setAttribute(1, 48);
    buffer.setAttribute(2, 39);
    buffer.setAttribute(3, 63);

    expect(buffer.getExtended(0)).toBe(0x08);
    expect(buffer.isUnderline(0)).toBe(true);
    expect(buffer.isColumnSeparator(1)).toBe(true);
    expect(buffer.isNonDisplay(2)).toBe(true);
    expect(buffer.getExtended(3)).toBe(0x03);
  });

  it('ignores attribute code 0', () => {
    buffer.setAttribute(5, 36);
    buffer.setAttribute(5, 0);

    expect(buffer.getAttribute(5)).toBe(36);
    expect(buffer.getExtended(5)).toBe(0x08);
  });

  it('stores codes outside 32..63 without extended flags', () => {
    buffer.setAttribute(5, 36);
    buffer.setAttribute(5, 0x70);

    expect(buffer.getAttribute(5)).toBe(0x70);
    expect(buffer.getExtended(5)).toBe(0);
  });

  it('throws for positions outside the buffer', () => {
    expect(() => buffer.getChar(1920)).toThrow(BufferPositionError);
    expect(() => buffer.setChar(-1, 'A')).toThrow(BufferPositionError);
    expect(() => buffer.setAttribute(1920, 0)).toThrow(BufferPositionError);
  });

  it('rejects a non-positive size', () => {
    expect(
      () => new TN5250ScreenBuffer({ rows: 0, columns: 80, logger: silentLogger() })
    ).toThrow(InvalidOptionError);
  });

  describe('error line', () => {
    it('defaults to the last row and falls back to it', () => {
      expect(buffer.getErrorLine()).toBe(24);

      buffer.setErrorLine(5);
      expect(buffer.getErrorLine()).toBe(5);

      buffer.setErrorLine(0);
      expect(buffer.getErrorLine()).toBe(24);

      buffer.setErrorLine(25);
      expect(buffer.getErrorLine()).toBe(24);
    });

    const fillRow = (row: number) => {
      const start = (row - 1) * 80;

      for (let column = 0; column < 80; column++) {
        buffer.setChar(start + column, String.fromCharCode(0x100 + column));
        buffer.setAttribute(start + column, 32 + column);
        buffer.setRendererMarker(start + column, column + 1);
      }
    };

    const corruptRow = (row: number) => {
      const start = (row - 1) * 80;

      for (let column = 0; column < 80; column++) {
        buffer.setChar(start + column, '!');
        buffer.setAttribute(start + column, 0x28);
        buffer.setRendererMarker(start + column, 0);
      }
    };

    it('restores every column of every plane', () => {
      buffer.setErrorLine(5);
      fillRow(5);

      buffer.saveErrorLine();
      expect(buffer.isErrorLineSaved()).toBe(true);

      corruptRow(5);

      expect(buffer.restoreErrorLine()).toBe(true);
      expect(buffer.isErrorLineSaved()).toBe(false);

      const start = 4 * 80;

      for (let column = 0; column < 80; column++) {
        expect(buffer.getChar(start + column)).toBe(
          String.fromCharCode(0x100 + column)
        );
        expect(buffer.getAttribute(start + column)).toBe(32 + column);
        expect(buffer.getExtended(start + column)).toBe(
          extendedFlagsFor(32 + column)
        );
        expect(buffer.getRendererMarker(start + column)).toBe(column + 1);
      }

      expect(buffer.getChar(start - 1)).toBe(' ');
      expect(buffer.getChar(start + 80)).toBe(' ');
    });

    it('restores to the row it was saved from after the error line moves', () => {
      buffer.setChar(23 * 80, 'S');
      buffer.saveErrorLine();
      buffer.setChar(23 * 80, 'X');

      buffer.setErrorLine(5);

      expect(buffer.restoreErrorLine()).toBe(true);
      expect(buffer.getChar(23 * 80)).toBe('S');
      expect(buffer.getChar(4 * 80)).toBe(' ');
    });

    it('does nothing when no line was saved', () => {
      buffer.setChar(1900, 'Z');

      expect(buffer.restoreErrorLine()).toBe(false);
      expect(buffer.getChar(1900)).toBe('Z');
    });
  });

  it('keeps overlapping cells across a resize', () => {
    buffer.setChar(100, 'Q');
    buffer.setAttribute(100, 0x28);
    buffer.saveErrorLine();

    buffer.resize(27, 132);

    expect(buffer.length).toBe(3564);
    expect(buffer.getChar(100)).toBe('Q');
    expect(buffer.getAttribute(100)).toBe(0x28);
    expect(buffer.getChar(3563)).toBe(' ');
    expect(buffer.getErrorLine()).toBe(27);
    expect(buffer.isErrorLineSaved()).toBe(false);
  });

  it('extracts clamped copies of a plane', () => {
    buffer.setChar(1919, 'E');
    buffer.setAttribute(0, 0x22);

    expect(buffer.extractPlane(1918, 5, Plane.TEXT)).toEqual([' ', 'E']);
    expect(buffer.extractPlane(-2, 4, Plane.ATTRIBUTE)).toEqual([0x22, 0x20]);
    expect(buffer.extractPlane(10, 0, Plane.EXTENDED)).toEqual([]);

    const copy = buffer.extractPlane(0, 1, Plane.RENDERER);
    copy[0] = 9;
    expect(buffer.getRendererMarker(0)).toBe(0);
  });

  it('renders a row with non-display cells blanked', () => {
    buffer.setChar(0, 'S');
    buffer.setChar(1, 'X');
    buffer.setAttribute(0, 39);

    expect(buffer.getRow(1)).toBe(' X' + ' '.repeat(78));
    expect(buffer.getRow(0)).toBe('');
  });

  it('clears all planes', () => {
    buffer.setChar(3, 'C');
    buffer.setAttribute(3, 63);
    buffer.setRendererMarker(3, 1);

    buffer.clearAll();

    expect(buffer.getChar(3)).toBe(' ');
    expect(buffer.getAttribute(3)).toBe(0x20);
    expect(buffer.getExtended(3)).toBe(0);
    expect(buffer.getRendererMarker(3)).toBe(0);
  });
});
