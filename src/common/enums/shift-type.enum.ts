/**
 * Keyboard shift of an input field, decoded from the three low bits of the
 * first field format word.
 */
export enum ShiftType {
  /**
   * ALPHA - Alphanumeric shift, alphabetic only and katakana shift (0, 1, 4)
   */
  ALPHA = 'alpha',

  /**
   * OUTPUT - I/O (feature input) field (6); the keyboard cannot key into it
   */
  OUTPUT = 'output',

  /**
   * BOTH - Numeric shift (2); numeric keys preferred but any key accepted
   */
  BOTH = 'both',

  /**
   * NUMERIC - Numeric only (3)
   */
  NUMERIC = 'numeric',

  /**
   * HIDDEN - Digits only (5)
   */
  HIDDEN = 'hidden',

  /**
   * SIGNED_NUMERIC - Signed numeric (7); last position holds the sign
   */
  SIGNED_NUMERIC = 'signed-numeric',
}

export const SHIFT_TYPE_BY_CODE: readonly ShiftType[] = [
  ShiftType.ALPHA,
  ShiftType.ALPHA,
  ShiftType.BOTH,
  ShiftType.NUMERIC,
  ShiftType.ALPHA,
  ShiftType.HIDDEN,
  ShiftType.OUTPUT,
  ShiftType.SIGNED_NUMERIC,
];
