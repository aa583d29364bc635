import { beforeEach, describe, expect, it } from 'vitest';
import { TN5250FieldTable } from '../src/tn5250-field-table';
import { TN5250ScreenBuffer } from '../src/tn5250-screen-buffer';
import { inputFormat, silentLogger } from './helpers';

describe('TN5250FieldTable', () => {
  let buffer: TN5250ScreenBuffer;
  let fields: TN5250FieldTable;

  beforeEach(() => {
    const logger = silentLogger();

    buffer = new TN5250ScreenBuffer({ rows: 24, columns: 80, logger });
    fields = new TN5250FieldTable(buffer, logger);
  });

  it('truncates text to the field without touching its neighbour', () => {
    const first = fields.addField(0, inputFormat);
    const second = fields.addField(5, inputFormat);

    fields.setFieldText(second, 'XY');
    expect(fields.setFieldText(first, 'ABCDEFGHIJ')).toBe(true);

    expect(fields.getFieldText(first)).toBe('ABCDE');
    expect(fields.getFieldText(second)).toBe('XY   ');
    expect(first.isModified()).toBe(true);
  });

  it('pads short text and folds to upper case when asked', () => {
    const upper = fields.addField(20, { ...inputFormat, ffw2: 0x20 });

    fields.setFieldText(upper, 'abc');

    expect(fields.getFieldText(upper)).toBe('ABC  ');
  });

  it('modifies a field redefined at the same start position', () => {
    const original = fields.addField(40, inputFormat);
    const redefined = fields.addField(40, { ...inputFormat, length: 8 });

    expect(redefined).toBe(original);
    expect(fields.size).toBe(1);
    expect(original.endPos).toBe(47);
  });

  it('has no content for empty or out-of-buffer fields', () => {
    const empty = fields.addField(0, { ...inputFormat, length: 0 });
    const overflowing = fields.addField(1918, inputFormat);

    expect(fields.getFieldText(empty)).toBeNull();
    expect(fields.getFieldText(overflowing)).toBeNull();
    expect(fields.setFieldText(overflowing, 'A')).toBe(false);
  });

  it('finds fields by position and index', () => {
    const first = fields.addField(0, inputFormat);
    const second = fields.addField(10, inputFormat);

    expect(fields.findByPosition(12)).toBe(second);
    expect(fields.findByPosition(7)).toBeUndefined();
    expect(fields.getField(0)).toBe(first);
    expect(fields.indexOf(second)).toBe(1);
  });

  describe('navigation', () => {
    it('wraps and skips bypass fields', () => {
      const a = fields.addField(0, inputFormat);
      fields.addField(10, { ...inputFormat, ffw1: 0x60 });
      const c = fields.addField(20, inputFormat);

      expect(fields.gotoFieldNext()).toBe(a);
      expect(fields.gotoFieldNext()).toBe(c);
      expect(fields.gotoFieldNext()).toBe(a);
      expect(fields.gotoFieldPrev()).toBe(c);
      expect(fields.getCurrentField()).toBe(c);
    });

    it('starts from the last field going backwards', () => {
      fields.addField(0, inputFormat);
      const last = fields.addField(20, inputFormat);

      expect(fields.gotoFieldPrev()).toBe(last);
    });

    it('keeps the current field when no field takes input', () => {
      const bypass = fields.addField(0, { ...inputFormat, ffw1: 0x60 });
      fields.setCurrentField(bypass);

      expect(fields.gotoFieldNext()).toBeUndefined();
      expect(fields.getCurrentField()).toBe(bypass);
      expect(fields.isCurrentFieldBypassField()).toBe(true);
    });
  });

  it('answers current field questions with no current field', () => {
    expect(fields.isCurrentField()).toBe(false);
    expect(fields.isCurrentFieldFER()).toBe(false);
    expect(fields.isCurrentFieldMandatoryEnter()).toBe(false);
  });

  it('lists and resets modified fields', () => {
    const first = fields.addField(0, inputFormat);
    fields.addField(10, inputFormat);
    const third = fields.addField(20, { ...inputFormat, ffw1: 0x48 });

    fields.setFieldText(first, 'A');

    expect(fields.getModifiedFields()).toEqual([first, third]);

    fields.resetModified();
    expect(fields.getModifiedFields()).toEqual([]);
  });

  it('forgets the current field when cleared', () => {
    const first = fields.addField(0, inputFormat);
    fields.setCurrentField(first);

    fields.clear();

    expect(fields.size).toBe(0);
    expect(fields.getCurrentField()).toBeUndefined();
  });
});
