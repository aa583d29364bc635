import { Logger } from './logger';
import { TN5250FieldTable } from './tn5250-field-table';
import { TN5250OIA } from './tn5250-oia';
import { TN5250ScreenBuffer } from './tn5250-screen-buffer';
import type { CursorState, Logger as ILogger } from './types';

export class TN5250Cursor {
  private logger: ILogger;
  private _position = 0;
  private active = true;
  private visible = true;

  constructor(
    private readonly buffer: TN5250ScreenBuffer,
    private readonly fields: TN5250FieldTable,
    private readonly oia: TN5250OIA,
    logger?: ILogger
  ) {
    this.logger = logger ?? new Logger(TN5250Cursor.name);
  }

  public get position(): number {
    return this._position;
  }

  public get state(): CursorState {
    return {
      position: this._position,
      active: this.active,
      visible: this.visible,
    };
  }

  /**
   * Linear position of a 1-based row and column. Nothing is clamped: row or
   * column 0 gives a position before the buffer.
   */
  public positionOf(row: number, column: number): number {
    return (row - 1) * this.buffer.columns + (column - 1);
  }

  public get row(): number {
    return Math.floor(this._position / this.buffer.columns) + 1;
  }

  public get column(): number {
    return (this._position % this.buffer.columns) + 1;
  }

  /**
   * Raw setter: stores the position computed from a 1-based row and column
   * even when it falls outside the buffer, in which case the planes will
   * refuse it.
   */
  public setCursor(row: number, column: number): void {
    this._position = this.positionOf(row, column);

    if (!this.isCursorInBounds())
      this.logger.warn(
        `Cursor set outside of the screen: row ${row}, column ${column}`
      );
  }

  public isCursorInBounds(): boolean {
    return this.buffer.isValidPosition(this._position);
  }

  /**
   * Operator movement. Refused while the keyboard is locked and for any
   * position outside `[0, rows * columns)`.
   */
  public moveCursor(position: number): boolean {
    if (this.oia.isKeyBoardLocked()) {
      this.logger.warn(`Keyboard locked, cursor not moved to ${position}`);
      return false;
    }

    if (!this.buffer.isValidPosition(position)) {
      this.logger.warn(`Cursor position ${position} outside of the screen`);
      return false;
    }

    this._position = position;

    return true;
  }

  /**
   * Host addressing: positions the cursor regardless of the keyboard lock.
   */
  public setAddress(position: number): boolean {
    if (!this.buffer.isValidPosition(position)) {
      this.logger.error(`Buffer address ${position} outside of the screen`);
      return false;
    }

    this._position = position;

    return true;
  }

  public processSetBufferAddress(row: number, column: number): boolean {
    const validRow =
      Number.isInteger(row) && row >= 1 && row <= this.buffer.rows;
    const validColumn =
      Number.isInteger(column) && column >= 1 && column <= this.buffer.columns;

    if (!validRow || !validColumn) {
      this.logger.error(
        `Invalid Set Buffer Address: row ${row}, column ${column}`
      );
      return false;
    }

    return this.setAddress(this.positionOf(row, column));
  }

  /**
   * Moves the write address forward, wrapping at the end of the buffer.
   */
  public advance(amount = 1): void {
    const length = this.buffer.length;

    this._position = (((this._position + amount) % length) + length) % length;
  }

  public gotoField(fieldIndex: number): boolean {
    if (
      !Number.isInteger(fieldIndex) ||
      fieldIndex <= 0 ||
      fieldIndex > this.fields.size
    ) {
      this.logger.warn(`No field ${fieldIndex}`);
      return false;
    }

    const field = this.fields.getField(fieldIndex - 1);

    if (!field || !this.moveCursor(field.startPos)) return false;

    this.fields.setCurrentField(field);

    return true;
  }

  public gotoFieldNext(): boolean {
    return this.gotoAdjacentField(() => this.fields.gotoFieldNext());
  }

  public gotoFieldPrev(): boolean {
    return this.gotoAdjacentField(() => this.fields.gotoFieldPrev());
  }

  public isCursorActive(): boolean {
    return this.active;
  }

  public setCursorActive(active: boolean): void {
    this.active = active;
  }

  public isCursorVisible(): boolean {
    return this.visible;
  }

  public setCursorOn(): void {
    this.visible = true;
  }

  public setCursorOff(): void {
    this.visible = false;
  }

  private gotoAdjacentField(
    select: () => ReturnType<TN5250FieldTable['gotoFieldNext']>
  ): boolean {
    if (this.oia.isKeyBoardLocked()) {
      this.logger.warn('Keyboard locked, field navigation refused');
      return false;
    }

    const field = select();

    return field !== undefined && this.moveCursor(field.startPos);
  }
}
