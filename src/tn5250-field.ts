import { SHIFT_TYPE_BY_CODE, ShiftType } from './common/enums';
import type {
  FieldFormat,
  TN5250Field as ITN5250Field,
  TN5250FieldOptions,
} from './types';

// FFW1
export const FFW1_BYPASS_MASK = 0x20;
export const FFW1_DUP_ENABLE_MASK = 0x10;
export const FFW1_MODIFIED_MASK = 0x08;
export const FFW1_SHIFT_MASK = 0x07;

// FFW2
export const FFW2_AUTO_ENTER_MASK = 0x80;
export const FFW2_FER_MASK = 0x40;
export const FFW2_TO_UPPER_MASK = 0x20;
export const FFW2_MANDATORY_ENTER_MASK = 0x08;
export const FFW2_ADJUSTMENT_MASK = 0x07;

// FCW
export const FCW1_CONTINUED_MASK = 0x86;
export const FCW1_CURSOR_PROGRESSION = 0x88;
export const FCW1_HIGHLIGHTED_ENTRY = 0x89;

export const FCW2_CONTINUED_FIRST = 0x01;
export const FCW2_CONTINUED_LAST = 0x02;
export const FCW2_CONTINUED_MIDDLE = 0x03;

export class TN5250Field implements ITN5250Field {
  public startPos: number;
  public endPos = 0;
  public shiftType = ShiftType.ALPHA;
  public attribute = 0;
  public cursorProgression = 0;
  private length = 0;
  private ffw1 = 0;
  private ffw2 = 0;
  private fcw1 = 0;
  private fcw2 = 0;
  private modified = false;

  constructor({ startPos, ...format }: TN5250FieldOptions) {
    this.startPos = startPos;

    this.applyFormat(format);
  }

  /**
   * Decodes a Start-Field format. Shift type, modified tag and cursor
   * progression are derived once here.
   */
  public applyFormat({
    attribute,
    length,
    ffw1,
    ffw2,
    fcw1,
    fcw2,
  }: FieldFormat): void {
    this.attribute = attribute;
    this.length = Math.max(length, 0);
    this.endPos = this.startPos + this.length - 1;
    this.ffw1 = ffw1;
    this.ffw2 = ffw2;
    this.fcw1 = fcw1;
    this.fcw2 = fcw2;
    this.shiftType = SHIFT_TYPE_BY_CODE[ffw1 & FFW1_SHIFT_MASK];
    this.modified = (ffw1 & FFW1_MODIFIED_MASK) !== 0;
    this.cursorProgression = fcw1 === FCW1_CURSOR_PROGRESSION ? fcw2 : 0;
  }

  public getFormat(): FieldFormat {
    return {
      attribute: this.attribute,
      length: this.length,
      ffw1: this.ffw1,
      ffw2: this.ffw2,
      fcw1: this.fcw1,
      fcw2: this.fcw2,
    };
  }

  public getLength(): number {
    return this.length;
  }

  public getFFW1(): number {
    return this.ffw1;
  }

  public getFFW2(): number {
    return this.ffw2;
  }

  public getFCW1(): number {
    return this.fcw1;
  }

  public getFCW2(): number {
    return this.fcw2;
  }

  public contains(position: number): boolean {
    return this.startPos <= position && position <= this.endPos;
  }

  public isBypassField(): boolean {
    return (this.ffw1 & FFW1_BYPASS_MASK) !== 0;
  }

  public isProtected(): boolean {
    return this.isBypassField();
  }

  public isDupEnabled(): boolean {
    return (this.ffw1 & FFW1_DUP_ENABLE_MASK) !== 0;
  }

  public isNumeric(): boolean {
    return this.shiftType === ShiftType.NUMERIC;
  }

  public isSignedNumeric(): boolean {
    return this.shiftType === ShiftType.SIGNED_NUMERIC;
  }

  public isAutoEnter(): boolean {
    return (this.ffw2 & FFW2_AUTO_ENTER_MASK) !== 0;
  }

  public isFER(): boolean {
    return (this.ffw2 & FFW2_FER_MASK) !== 0;
  }

  public isToUpper(): boolean {
    return (this.ffw2 & FFW2_TO_UPPER_MASK) !== 0;
  }

  public isMandatoryEnter(): boolean {
    return (this.ffw2 & FFW2_MANDATORY_ENTER_MASK) !== 0;
  }

  public getAdjustment(): number {
    return this.ffw2 & FFW2_ADJUSTMENT_MASK;
  }

  public isContinued(): boolean {
    return (
      this.hasContinuedControl() &&
      this.fcw2 >= FCW2_CONTINUED_FIRST &&
      this.fcw2 <= FCW2_CONTINUED_MIDDLE
    );
  }

  public isContinuedFirst(): boolean {
    return this.hasContinuedControl() && this.fcw2 === FCW2_CONTINUED_FIRST;
  }

  public isContinuedMiddle(): boolean {
    return this.hasContinuedControl() && this.fcw2 === FCW2_CONTINUED_MIDDLE;
  }

  public isContinuedLast(): boolean {
    return this.hasContinuedControl() && this.fcw2 === FCW2_CONTINUED_LAST;
  }

  public isHighlightedEntry(): boolean {
    return this.fcw1 === FCW1_HIGHLIGHTED_ENTRY;
  }

  public isModified(): boolean {
    return this.modified;
  }

  public markAsModified(): void {
    this.modified = true;
    this.ffw1 |= FFW1_MODIFIED_MASK;
  }

  public markAsUnmodified(): void {
    this.modified = false;
    this.ffw1 &= ~FFW1_MODIFIED_MASK;
  }

  private hasContinuedControl(): boolean {
    return (this.fcw1 & FCW1_CONTINUED_MASK) === FCW1_CONTINUED_MASK;
  }
}
