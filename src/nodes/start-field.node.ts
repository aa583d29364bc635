import { FFW1_BYPASS_MASK } from '../tn5250-field';
import type { FieldFormat, TN5250OrderNode, TN5250Screen } from '../types';

const isFieldFormatWord = (byte: number) => (byte & 0xc0) === 0x40;
const isFieldControlWord = (byte: number) => (byte & 0xc0) === 0x80;

/**
 * Start Field: `[FFW1 FFW2 (FCW1 FCW2)*] attribute length-hi length-lo`.
 * Output-only fields carry no format word and are defined as bypass fields.
 * Only the first control word is kept.
 */
export class StartFieldNode implements TN5250OrderNode {
  readonly data: number[] = [];

  appendData(...data: number[]): void {
    this.data.push(...data);
  }

  isComplete(): boolean {
    return this.parse() !== undefined;
  }

  execute(screen: TN5250Screen): boolean {
    const format = this.parse();

    if (!format) return false;

    screen.writeData([format.attribute]);
    screen.startField(format);

    return true;
  }

  private parse(): FieldFormat | undefined {
    const { data } = this;
    const format = { ffw1: FFW1_BYPASS_MASK, ffw2: 0, fcw1: 0, fcw2: 0 };
    let offset = 0;

    if (data.length === 0) return undefined;

    if (isFieldFormatWord(data[0])) {
      if (data.length < 2) return undefined;

      format.ffw1 = data[0];
      format.ffw2 = data[1];
      offset = 2;

      while (offset < data.length && isFieldControlWord(data[offset])) {
        if (offset + 1 >= data.length) return undefined;

        if (offset === 2) {
          format.fcw1 = data[offset];
          format.fcw2 = data[offset + 1];
        }

        offset += 2;
      }
    }

    if (data.length < offset + 3) return undefined;

    return {
      ...format,
      attribute: data[offset],
      length: (data[offset + 1] << 8) | data[offset + 2],
    };
  }
}
