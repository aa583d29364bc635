import type {
  AttributeColor,
  AttributeDescription,
  ExtendedAttributes,
} from './types';

export const EXTENDED_NON_DISPLAY = 0x01;
export const EXTENDED_COLUMN_SEPARATOR = 0x02;
export const EXTENDED_UNDERLINE = 0x08;

export const ATTRIBUTE_FIRST = 0x20;
export const ATTRIBUTE_LAST = 0x3f;

// Green, normal intensity
export const DEFAULT_ATTRIBUTE = 0x20;

const UNDERLINE_CODES = new Set([
  36, 37, 38, 44, 45, 46, 52, 53, 54, 60, 61, 62,
]);
const COLUMN_SEPARATOR_CODES = new Set([48, 49, 50, 51, 63]);
const NON_DISPLAY_CODES = new Set([39, 47, 55, 63]);

export function isAttributeByte(byte: number): boolean {
  return byte >= ATTRIBUTE_FIRST && byte <= ATTRIBUTE_LAST;
}

/**
 * Extended flag bits carried by a 5250 screen attribute. Codes outside
 * 32..63 carry none.
 */
export function extendedFlagsFor(attribute: number): number {
  let flags = 0;

  if (UNDERLINE_CODES.has(attribute)) flags |= EXTENDED_UNDERLINE;
  if (COLUMN_SEPARATOR_CODES.has(attribute)) flags |= EXTENDED_COLUMN_SEPARATOR;
  if (NON_DISPLAY_CODES.has(attribute)) flags |= EXTENDED_NON_DISPLAY;

  return flags;
}

export function decodeExtendedFlags(flags: number): ExtendedAttributes {
  return {
    underline: (flags & EXTENDED_UNDERLINE) !== 0,
    columnSeparator: (flags & EXTENDED_COLUMN_SEPARATOR) !== 0,
    nonDisplay: (flags & EXTENDED_NON_DISPLAY) !== 0,
  };
}

function colorOf(attribute: number): AttributeColor {
  const alternate = (attribute & 0x02) !== 0;

  switch (attribute & 0x38) {
    case 0x20:
      return alternate ? 'white' : 'green';
    case 0x28:
      return 'red';
    case 0x30:
      return alternate ? 'yellow' : 'turquoise';
    default:
      return alternate ? 'blue' : 'pink';
  }
}

export function describeAttribute(
  attribute: number
): AttributeDescription | undefined {
  if (!isAttributeByte(attribute)) return undefined;

  const extended = decodeExtendedFlags(extendedFlagsFor(attribute));

  return {
    ...extended,
    color: colorOf(attribute),
    reverse: !extended.nonDisplay && (attribute & 0x01) !== 0,
    blink:
      !extended.nonDisplay &&
      (attribute & 0x38) === 0x28 &&
      (attribute & 0x02) !== 0,
  };
}
