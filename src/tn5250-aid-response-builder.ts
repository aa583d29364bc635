import { AID, FieldCollectionMode, ResponseFormat } from './common/enums';
import { Logger } from './logger';
import { TN5250Field } from './tn5250-field';
import { TN5250FieldTable } from './tn5250-field-table';
import { TN5250OIA } from './tn5250-oia';
import type {
  AidResponseOptions,
  CodePageTranslator,
  CursorAddress,
  Logger as ILogger,
} from './types';

export const FIELD_LOCATION_TAG = 0xc0;
export const MAX_FIELD_DATA_LENGTH = 0xff;

/**
 * Serializes an attention key for the host:
 *
 * ```
 * aid [row column] ([0xc0] length data...)*
 * ```
 *
 * Row and column are the 1-based cursor coordinates clamped into
 * `[0, rows]` and `[0, columns]`.
 */
export class TN5250AidResponseBuilder {
  public responseFormat: ResponseFormat;
  private codePageTranslator: CodePageTranslator;
  private logger: ILogger;

  constructor(
    private readonly fields: TN5250FieldTable,
    private readonly oia: TN5250OIA,
    options: AidResponseOptions
  ) {
    this.codePageTranslator = options.codePageTranslator;
    this.responseFormat = options.responseFormat ?? ResponseFormat.LONG;
    this.logger = options.logger ?? new Logger(TN5250AidResponseBuilder.name);
  }

  public buildResponse(
    aid: AID,
    cursor: CursorAddress,
    fieldCollectionMode: FieldCollectionMode,
    includeCursor: boolean
  ): Buffer {
    const bytes: number[] = [aid];

    if (includeCursor) {
      const { rows, columns } = this.fields.buffer;

      bytes.push(clamp(cursor.row, rows), clamp(cursor.column, columns));
    }

    if (this.responseFormat !== ResponseFormat.SHORT) {
      for (const field of this.collectFields(fieldCollectionMode)) {
        bytes.push(...this.serializeField(field));
      }
    }

    if (this.oia.clearInputError())
      this.logger.debug(`Input error cleared by AID 0x${aid.toString(16)}`);

    return Buffer.from(bytes);
  }

  private collectFields(mode: FieldCollectionMode): TN5250Field[] {
    switch (mode) {
      case FieldCollectionMode.NONE:
        return [];
      case FieldCollectionMode.MODIFIED_ONLY:
        return this.fields.getModifiedFields();
      case FieldCollectionMode.ALL:
        return [...this.fields.getFields()];
    }
  }

  private serializeField(field: TN5250Field): number[] {
    const text = this.fields.getFieldText(field);

    if (text === null) return [];

    const data = this.codePageTranslator
      .toEBCDIC(text)
      .slice(0, MAX_FIELD_DATA_LENGTH);

    const tag =
      this.responseFormat === ResponseFormat.STRUCTURED
        ? [FIELD_LOCATION_TAG]
        : [];

    return [...tag, data.length, ...data];
  }
}

function clamp(value: number, max: number): number {
  return Math.max(0, Math.min(Math.trunc(value), max));
}
