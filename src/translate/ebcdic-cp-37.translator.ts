import type { CodePageTranslator } from '../types';
import cp037 from './cp037.json';

const SUBSTITUTE_EBCDIC = 0x6f; // '?'

export class EbcdicCP37Translator implements CodePageTranslator {
  readonly name = cp037.name;
  private readonly toUnicode: readonly number[] = cp037.ebcdicToUnicode;
  private readonly fromUnicode = new Map<number, number>();

  constructor() {
    this.toUnicode.forEach((codePoint, ebcdic) =>
      this.fromUnicode.set(codePoint, ebcdic)
    );
  }

  toEBCDIC(text: string): number[] {
    return [...text].map((char) => {
      const codePoint = char.codePointAt(0) ?? 0;

      return this.fromUnicode.get(codePoint) ?? SUBSTITUTE_EBCDIC;
    });
  }

  fromEBCDIC(data: number[]): string {
    return data
      .map((byte) => String.fromCodePoint(this.toUnicode[byte & 0xff]))
      .join('');
  }
}
