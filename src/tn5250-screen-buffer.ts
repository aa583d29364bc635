import { Plane } from './common/enums';
import { BufferPositionError, InvalidOptionError } from './errors';
import { Logger } from './logger';
import {
  DEFAULT_ATTRIBUTE,
  EXTENDED_COLUMN_SEPARATOR,
  EXTENDED_NON_DISPLAY,
  EXTENDED_UNDERLINE,
  extendedFlagsFor,
} from './tn5250-attributes';
import type { Logger as ILogger, TN5250ScreenBufferOptions } from './types';

export const EMPTY_CHAR = ' ';

interface SavedLine {
  start: number;
  text: string[];
  attributes: number[];
  extended: number[];
  renderer: number[];
}

/**
 * Four parallel planes of `rows * columns` cells: character, attribute code,
 * extended flag bits and an opaque marker left for the renderer.
 */
export class TN5250ScreenBuffer {
  private logger: ILogger;
  private _rows = 0;
  private _columns = 0;
  private text: string[] = [];
  private attributes = new Int32Array(0);
  private extended = new Uint8Array(0);
  private renderer = new Uint8Array(0);
  private errorLine = 0;
  private savedLine: SavedLine | undefined;

  constructor(options: TN5250ScreenBufferOptions) {
    this.logger = options.logger ?? new Logger(TN5250ScreenBuffer.name);

    this.allocate(options.rows, options.columns);
    this.setErrorLine(options.errorLine ?? options.rows);
  }

  public get rows(): number {
    return this._rows;
  }

  public get columns(): number {
    return this._columns;
  }

  public get length(): number {
    return this._rows * this._columns;
  }

  public setChar(pos: number, char: string): void {
    this.checkPosition(pos);

    this.text[pos] = char;
  }

  public getChar(pos: number): string {
    this.checkPosition(pos);

    return this.text[pos];
  }

  /**
   * Stores the attribute code and disperses its extended flags. Code 0 leaves
   * every plane untouched.
   */
  public setAttribute(pos: number, attribute: number): void {
    this.checkPosition(pos);

    if (attribute === 0) return;

    this.attributes[pos] = attribute;
    this.extended[pos] = extendedFlagsFor(attribute);
  }

  public getAttribute(pos: number): number {
    this.checkPosition(pos);

    return this.attributes[pos];
  }

  public getExtended(pos: number): number {
    this.checkPosition(pos);

    return this.extended[pos];
  }

  public isUnderline(pos: number): boolean {
    return (this.getExtended(pos) & EXTENDED_UNDERLINE) !== 0;
  }

  public isColumnSeparator(pos: number): boolean {
    return (this.getExtended(pos) & EXTENDED_COLUMN_SEPARATOR) !== 0;
  }

  public isNonDisplay(pos: number): boolean {
    return (this.getExtended(pos) & EXTENDED_NON_DISPLAY) !== 0;
  }

  public setRendererMarker(pos: number, marker: number): void {
    this.checkPosition(pos);

    this.renderer[pos] = marker;
  }

  public getRendererMarker(pos: number): number {
    this.checkPosition(pos);

    return this.renderer[pos];
  }

  public getErrorLine(): number {
    return this.errorLine;
  }

  /**
   * Row (1-based) used for host error messages; anything outside the screen
   * selects the last row.
   */
  public setErrorLine(row: number): void {
    this.errorLine =
      Number.isInteger(row) && row >= 1 && row <= this._rows ? row : this._rows;
  }

  public isErrorLineSaved(): boolean {
    return this.savedLine !== undefined;
  }

  public saveErrorLine(): void {
    const start = this.errorLineStart();
    const end = start + this._columns;

    this.savedLine = {
      start,
      text: this.text.slice(start, end),
      attributes: Array.from(this.attributes.subarray(start, end)),
      extended: Array.from(this.extended.subarray(start, end)),
      renderer: Array.from(this.renderer.subarray(start, end)),
    };

    this.logger.debug(`Saved error line ${this.errorLine}`);
  }

  /**
   * Copies the saved error line back to the row it was taken from and forgets
   * it, even if the error line has moved since. Returns false when nothing
   * was saved.
   */
  public restoreErrorLine(): boolean {
    const saved = this.savedLine;

    if (!saved) return false;

    for (let column = 0; column < saved.text.length; column++) {
      const pos = saved.start + column;

      this.text[pos] = saved.text[column];
      this.attributes[pos] = saved.attributes[column];
      this.extended[pos] = saved.extended[column];
      this.renderer[pos] = saved.renderer[column];
    }

    this.savedLine = undefined;

    this.logger.debug(
      `Restored error line ${saved.start / this._columns + 1}`
    );

    return true;
  }

  /**
   * Reallocates every plane. Cells whose linear position exists in both sizes
   * keep their content; the saved error line is dropped.
   */
  public resize(rows: number, columns: number): void {
    const previous = {
      text: this.text,
      attributes: this.attributes,
      extended: this.extended,
      renderer: this.renderer,
    };

    this.allocate(rows, columns);

    const kept = Math.min(previous.text.length, this.length);

    for (let pos = 0; pos < kept; pos++) {
      this.text[pos] = previous.text[pos];
      this.attributes[pos] = previous.attributes[pos];
      this.extended[pos] = previous.extended[pos];
      this.renderer[pos] = previous.renderer[pos];
    }

    this.savedLine = undefined;
    this.setErrorLine(rows);
  }

  public extractPlane(startPos: number, length: number, plane: Plane.TEXT): string[];
  public extractPlane(
    startPos: number,
    length: number,
    plane: Exclude<Plane, Plane.TEXT>
  ): number[];
  public extractPlane(
    startPos: number,
    length: number,
    plane: Plane
  ): string[] | number[] {
    const start = Math.max(0, startPos);
    const end = Math.min(this.length, startPos + Math.max(0, length));

    if (end <= start) return [];

    switch (plane) {
      case Plane.TEXT:
        return this.text.slice(start, end);
      case Plane.ATTRIBUTE:
        return Array.from(this.attributes.subarray(start, end));
      case Plane.EXTENDED:
        return Array.from(this.extended.subarray(start, end));
      case Plane.RENDERER:
        return Array.from(this.renderer.subarray(start, end));
    }
  }

  public getText(startPos: number, length: number): string {
    return this.extractPlane(startPos, length, Plane.TEXT).join('');
  }

  /**
   * Row (1-based) as displayed: non-display cells read as blanks.
   */
  public getRow(row: number): string {
    if (!Number.isInteger(row) || row < 1 || row > this._rows) return '';

    const start = (row - 1) * this._columns;
    let line = '';

    for (let pos = start; pos < start + this._columns; pos++) {
      line += this.extended[pos] & EXTENDED_NON_DISPLAY ? EMPTY_CHAR : this.text[pos];
    }

    return line;
  }

  public clearAll(): void {
    this.text.fill(EMPTY_CHAR);
    this.attributes.fill(DEFAULT_ATTRIBUTE);
    this.extended.fill(extendedFlagsFor(DEFAULT_ATTRIBUTE));
    this.renderer.fill(0);
  }

  public isValidPosition(pos: number): boolean {
    return Number.isInteger(pos) && pos >= 0 && pos < this.length;
  }

  private checkPosition(pos: number): void {
    if (!this.isValidPosition(pos)) throw new BufferPositionError(pos, this.length);
  }

  private errorLineStart(): number {
    return (this.errorLine - 1) * this._columns;
  }

  private allocate(rows: number, columns: number): void {
    if (!Number.isInteger(rows) || rows <= 0)
      throw new InvalidOptionError('rows', rows);
    if (!Number.isInteger(columns) || columns <= 0)
      throw new InvalidOptionError('columns', columns);

    this._rows = rows;
    this._columns = columns;

    const size = rows * columns;

    this.text = new Array<string>(size);
    this.attributes = new Int32Array(size);
    this.extended = new Uint8Array(size);
    this.renderer = new Uint8Array(size);

    this.clearAll();
  }
}
