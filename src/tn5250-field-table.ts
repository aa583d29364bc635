import { Logger } from './logger';
import { TN5250Field } from './tn5250-field';
import { EMPTY_CHAR, TN5250ScreenBuffer } from './tn5250-screen-buffer';
import type { FieldFormat, Logger as ILogger } from './types';

export class TN5250FieldTable {
  private logger: ILogger;
  private fields: TN5250Field[] = [];
  private currentIndex = -1;

  constructor(readonly buffer: TN5250ScreenBuffer, logger?: ILogger) {
    this.logger = logger ?? new Logger(TN5250FieldTable.name);
  }

  public get size(): number {
    return this.fields.length;
  }

  public clear(): void {
    this.fields = [];
    this.currentIndex = -1;

    this.logger.debug('Field table cleared');
  }

  /**
   * Appends a field starting at `startPos`. A Start-Field aimed at the start
   * of an existing field rewrites that field's format instead, keeping its
   * place in the table.
   */
  public addField(startPos: number, format: FieldFormat): TN5250Field {
    const existing = this.fields.find((f) => f.startPos === startPos);

    if (existing) {
      existing.applyFormat(format);

      this.logger.debug(
        `Field at ${startPos} redefined: ${existing.startPos} - ${existing.endPos}`
      );

      return existing;
    }

    const field = new TN5250Field({ startPos, ...format });

    this.fields.push(field);

    this.logger.debug(`Field ${field.startPos} - ${field.endPos} added`);

    return field;
  }

  public getFields(): readonly TN5250Field[] {
    return this.fields;
  }

  public getField(index: number): TN5250Field | undefined {
    return this.fields[index];
  }

  public indexOf(field: TN5250Field): number {
    return this.fields.indexOf(field);
  }

  public findByPosition(position: number): TN5250Field | undefined {
    return this.fields.find((f) => f.contains(position));
  }

  public getCurrentField(): TN5250Field | undefined {
    return this.fields[this.currentIndex];
  }

  public setCurrentField(field: TN5250Field | undefined): void {
    this.currentIndex = field ? this.fields.indexOf(field) : -1;
  }

  public isCurrentField(): boolean {
    return this.getCurrentField() !== undefined;
  }

  /**
   * Makes the next input field current, wrapping from the last field to the
   * first. Bypass and zero-length fields are skipped.
   */
  public gotoFieldNext(): TN5250Field | undefined {
    return this.step(1);
  }

  /**
   * Makes the previous input field current, wrapping from the first field to
   * the last.
   */
  public gotoFieldPrev(): TN5250Field | undefined {
    return this.step(-1);
  }

  public isCurrentFieldFER(): boolean {
    return this.getCurrentField()?.isFER() ?? false;
  }

  public isCurrentFieldDupEnabled(): boolean {
    return this.getCurrentField()?.isDupEnabled() ?? false;
  }

  public isCurrentFieldToUpper(): boolean {
    return this.getCurrentField()?.isToUpper() ?? false;
  }

  public isCurrentFieldBypassField(): boolean {
    return this.getCurrentField()?.isBypassField() ?? false;
  }

  public isCurrentFieldMandatoryEnter(): boolean {
    return this.getCurrentField()?.isMandatoryEnter() ?? false;
  }

  public isCurrentFieldAutoEnter(): boolean {
    return this.getCurrentField()?.isAutoEnter() ?? false;
  }

  /**
   * Field content read from the character plane, or null for a zero-length
   * field or one that does not lie wholly inside the buffer.
   */
  public getFieldText(field: TN5250Field): string | null {
    if (!this.hasContent(field)) return null;

    return this.buffer.getText(field.startPos, field.getLength());
  }

  /**
   * Writes `text` into the field, truncated to the field length and padded
   * with blanks, and sets its modified data tag.
   */
  public setFieldText(field: TN5250Field, text: string): boolean {
    if (!this.hasContent(field)) return false;

    const length = field.getLength();
    const chars = [...(field.isToUpper() ? text.toUpperCase() : text)];

    if (chars.length > length)
      this.logger.debug(
        `Text truncated from ${chars.length} to ${length} characters`
      );

    for (let i = 0; i < length; i++) {
      this.buffer.setChar(field.startPos + i, chars[i] ?? EMPTY_CHAR);
    }

    field.markAsModified();

    return true;
  }

  public getModifiedFields(): TN5250Field[] {
    return this.fields.filter((f) => f.isModified());
  }

  public resetModified(): void {
    for (const field of this.fields) field.markAsUnmodified();
  }

  private hasContent(field: TN5250Field): boolean {
    return (
      field.getLength() > 0 &&
      this.buffer.isValidPosition(field.startPos) &&
      this.buffer.isValidPosition(field.endPos)
    );
  }

  private step(direction: 1 | -1): TN5250Field | undefined {
    const count = this.fields.length;

    if (count === 0) return undefined;

    const origin =
      this.currentIndex >= 0 ? this.currentIndex : direction === 1 ? -1 : count;

    for (let i = 1; i <= count; i++) {
      const index = (((origin + direction * i) % count) + count) % count;
      const field = this.fields[index];

      if (field.isBypassField() || field.getLength() === 0) continue;

      this.currentIndex = index;

      return field;
    }

    return undefined;
  }
}
