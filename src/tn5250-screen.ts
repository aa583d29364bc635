import EventEmitter from 'events';
import {
  AID,
  FieldCollectionMode,
  InputInhibited,
  ResponseFormat,
  TN5250Orders,
} from './common/enums';
import {
  IncompleteOrderError,
  InvalidOptionError,
  UnsupportedOrderError,
} from './errors';
import { Logger } from './logger';
import {
  InsertCursorNode,
  RepeatToAddressNode,
  SetBufferAddressNode,
  StartFieldNode,
  WriteDataNode,
} from './nodes';
import { TN5250AidResponseBuilder } from './tn5250-aid-response-builder';
import { DEFAULT_ATTRIBUTE, isAttributeByte } from './tn5250-attributes';
import { TN5250Cursor } from './tn5250-cursor';
import { TN5250Field } from './tn5250-field';
import { TN5250FieldTable } from './tn5250-field-table';
import { TN5250OIA } from './tn5250-oia';
import { EMPTY_CHAR, TN5250ScreenBuffer } from './tn5250-screen-buffer';
import { EbcdicCP37Translator } from './translate/ebcdic-cp-37.translator';
import type {
  CodePage,
  CodePageTranslator,
  CodePageTranslatorRegistry,
  FieldFormat,
  Logger as ILogger,
  OrderNodeClassRegistry,
  TerminalModel,
  TerminalScreenSize,
  TN5250Events,
  TN5250OrderNode,
  TN5250Screen as ITN5250Screen,
  TN5250ScreenOptions,
  Type,
} from './types';

export const TN5250_MODELS: Record<TerminalModel, TerminalScreenSize> = {
  '3179-2': { rows: 24, columns: 80 },
  '3180-2': { rows: 27, columns: 132 },
  '3196-A1': { rows: 24, columns: 80 },
  '3477-FC': { rows: 27, columns: 132 },
};

const DEFAULT_MODEL: TerminalModel = '3179-2';

const DEFAULT_CODE_PAGE: CodePage = '37';

const CODE_PAGE_TRANSLATORS: Readonly<CodePageTranslatorRegistry> = {
  [DEFAULT_CODE_PAGE]: new EbcdicCP37Translator(),
};

export const isTerminalModel = (model: string): model is TerminalModel =>
  Object.prototype.hasOwnProperty.call(TN5250_MODELS, model);

/**
 * One emulated 5250 display: the screen buffer, field table, cursor and
 * operator information area of a single session, driven by Write-To-Display
 * orders from the host and by operator input.
 */
export class TN5250Screen extends EventEmitter implements ITN5250Screen {
  readonly model: TerminalModel;
  readonly buffer: TN5250ScreenBuffer;
  readonly fields: TN5250FieldTable;
  readonly cursor: TN5250Cursor;
  readonly oia: TN5250OIA;
  readonly aidResponseBuilder: TN5250AidResponseBuilder;
  readonly codePageTranslator: CodePageTranslator;
  private logger: ILogger;
  private lastAttribute = DEFAULT_ATTRIBUTE;
  private pendingCursor: number | undefined;
  private orderNodeClassRegistry: OrderNodeClassRegistry = {};

  constructor({
    model = DEFAULT_MODEL,
    rows,
    columns,
    codePage = DEFAULT_CODE_PAGE,
    codePageTranslator: customTranslator,
    responseFormat = ResponseFormat.LONG,
    errorLine,
    logger,
  }: TN5250ScreenOptions = {}) {
    super({ captureRejections: true });

    if (!isTerminalModel(model)) throw new InvalidOptionError('model', model);

    const codePageTranslator =
      customTranslator ?? CODE_PAGE_TRANSLATORS[codePage];

    if (!codePageTranslator) throw new InvalidOptionError('codePage', codePage);

    this.model = model;
    this.codePageTranslator = codePageTranslator;
    this.logger = logger ?? new Logger(TN5250Screen.name);

    this.buffer = new TN5250ScreenBuffer({
      rows: rows ?? TN5250_MODELS[model].rows,
      columns: columns ?? TN5250_MODELS[model].columns,
      errorLine,
      logger: this.logger,
    });
    this.fields = new TN5250FieldTable(this.buffer, this.logger);
    this.oia = new TN5250OIA(this.logger);
    this.cursor = new TN5250Cursor(
      this.buffer,
      this.fields,
      this.oia,
      this.logger
    );
    this.aidResponseBuilder = new TN5250AidResponseBuilder(
      this.fields,
      this.oia,
      { codePageTranslator, responseFormat, logger: this.logger }
    );

    this.registerDefaultOrderNodeClasses();
  }

  public get rows(): number {
    return this.buffer.rows;
  }

  public get columns(): number {
    return this.buffer.columns;
  }

  public get screenSize(): number {
    return this.buffer.length;
  }

  public registerOrderNodeClass(
    order: number,
    orderNodeClass: Type<TN5250OrderNode>
  ): void {
    this.orderNodeClassRegistry[order] = orderNodeClass;
  }

  /**
   * Applies one Write-To-Display order run. The whole run is parsed before
   * anything executes, so an unknown or truncated order leaves the screen as
   * it was and yields false. An order the screen rejects while executing (an
   * address off the screen, a repeat that runs backwards) stops the run there
   * and also yields false; orders before it stay applied and a pending insert
   * cursor is dropped.
   */
  public applyOrders(data: number[]): boolean {
    let nodes: TN5250OrderNode[];

    try {
      nodes = this.parseOrders(data);
    } catch (error) {
      if (
        error instanceof UnsupportedOrderError ||
        error instanceof IncompleteOrderError
      ) {
        this.logger.error(error.message);
        return false;
      }
      throw error;
    }

    this.pendingCursor = undefined;

    const completed = nodes.every((node) => node.execute(this));

    if (completed && this.pendingCursor !== undefined)
      this.cursor.setAddress(this.pendingCursor);

    this.pendingCursor = undefined;

    this.emit('screen-update');

    return completed;
  }

  public setBufferAddress(row: number, column: number): boolean {
    return this.cursor.processSetBufferAddress(row, column);
  }

  /**
   * Defines a field starting at the current cursor position.
   */
  public startField(format: FieldFormat): TN5250Field {
    return this.fields.addField(this.cursor.position, format);
  }

  public clearFieldTable(): void {
    this.fields.clear();
  }

  /**
   * Records where the cursor goes once the current order run completes.
   */
  public insertCursor(row: number, column: number): boolean {
    if (!this.isOnScreen(row, column)) {
      this.logger.error(`Invalid Insert Cursor: row ${row}, column ${column}`);
      return false;
    }

    this.pendingCursor = this.cursor.positionOf(row, column);

    return true;
  }

  /**
   * Repeats `char` from the current address up to and including the target
   * address.
   */
  public repeatToAddress(row: number, column: number, char: number): boolean {
    const target = this.cursor.positionOf(row, column);

    if (!this.isOnScreen(row, column) || target < this.cursor.position) {
      this.logger.error(
        `Invalid Repeat to Address: row ${row}, column ${column}`
      );
      return false;
    }

    this.writeData(Array(target - this.cursor.position + 1).fill(char));

    return true;
  }

  /**
   * Writes attributes and EBCDIC characters at the current address. An
   * attribute byte occupies a blank cell and colours the characters after it.
   */
  public writeData(data: number[]): void {
    for (const byte of data) {
      const pos = this.cursor.position;

      if (isAttributeByte(byte)) {
        this.lastAttribute = byte;
        this.buffer.setChar(pos, EMPTY_CHAR);
      } else {
        this.buffer.setChar(pos, this.codePageTranslator.fromEBCDIC([byte]));
      }

      this.buffer.setAttribute(pos, this.lastAttribute);
      this.cursor.advance();
    }
  }

  public moveCursor(position: number): boolean {
    return this.cursor.moveCursor(position);
  }

  public gotoField(fieldIndex: number): boolean {
    return this.cursor.gotoField(fieldIndex);
  }

  public gotoFieldNext(): boolean {
    return this.cursor.gotoFieldNext();
  }

  public gotoFieldPrev(): boolean {
    return this.cursor.gotoFieldPrev();
  }

  /**
   * Operator text entry into `field`, refused while the keyboard is locked
   * and for bypass fields.
   */
  public setFieldText(field: TN5250Field, text: string): boolean {
    if (this.oia.isKeyBoardLocked()) {
      this.logger.warn('Keyboard locked, field text refused');
      return false;
    }

    if (field.isBypassField()) {
      this.logger.warn('Cannot write to bypass field');
      return false;
    }

    return this.fields.setFieldText(field, text);
  }

  /**
   * Operator text entry into the field under the cursor.
   */
  public writeField(text: string): boolean {
    const field = this.fields.findByPosition(this.cursor.position);

    if (!field) {
      this.logger.warn('No field found to write to');
      return false;
    }

    this.fields.setCurrentField(field);

    return this.setFieldText(field, text);
  }

  /**
   * Sends an attention key. Refused while the keyboard is locked unless an
   * input error is pending; afterwards the keyboard stays locked in system
   * wait until the host unlocks it.
   */
  public sendAid(
    aid: AID,
    fieldCollectionMode = aid === AID.CLEAR
      ? FieldCollectionMode.NONE
      : FieldCollectionMode.MODIFIED_ONLY
  ): Buffer | undefined {
    if (this.oia.isKeyBoardLocked() && !this.oia.isInputError()) {
      this.logger.warn(`Keyboard locked, AID 0x${aid.toString(16)} refused`);
      return undefined;
    }

    const response = this.aidResponseBuilder.buildResponse(
      aid,
      { row: this.cursor.row, column: this.cursor.column },
      fieldCollectionMode,
      true
    );

    this.oia.setKeyboardLocked(true);
    this.oia.setInputInhibited(InputInhibited.SYSTEM_WAIT);

    this.emit('aid', response);

    return response;
  }

  public lockKeyboard(): void {
    this.oia.setKeyboardLocked(true);
  }

  public unlockKeyboard(): void {
    this.oia.setKeyboardLocked(false);
    this.oia.setInputInhibited(InputInhibited.NOT_INHIBITED);
  }

  /**
   * New screen format: blank planes, empty field table, cursor home.
   */
  public clear(): void {
    this.buffer.clearAll();
    this.fields.clear();
    this.cursor.setAddress(0);
    this.lastAttribute = DEFAULT_ATTRIBUTE;
    this.oia.clearScreen();
  }

  public resize(rows: number, columns: number): void {
    this.buffer.resize(rows, columns);
    this.fields.clear();
    this.cursor.setAddress(0);
  }

  public toString(): string {
    const rows: string[] = [];

    for (let row = 1; row <= this.rows; row++) rows.push(this.buffer.getRow(row));

    return rows.join('\n');
  }

  public on(event: TN5250Events, listener: (...args: unknown[]) => void): this {
    return super.on(event, listener);
  }

  public once(event: TN5250Events, listener: (...args: unknown[]) => void): this {
    return super.once(event, listener);
  }

  public off(event: TN5250Events, listener: (...args: unknown[]) => void): this {
    return super.off(event, listener);
  }

  private isOnScreen(row: number, column: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(column) &&
      row >= 1 &&
      row <= this.rows &&
      column >= 1 &&
      column <= this.columns
    );
  }

  private parseOrders(data: number[]): TN5250OrderNode[] {
    const nodes: TN5250OrderNode[] = [];

    let node: TN5250OrderNode | undefined;

    for (const byte of data) {
      if (node && !node.isComplete()) {
        node.appendData(byte);
        continue;
      }

      if (isAttributeByte(byte) || byte > 0x3f) {
        if (!(node instanceof WriteDataNode)) nodes.push((node = new WriteDataNode()));

        node.appendData(byte);
        continue;
      }

      const NodeClass = this.orderNodeClassRegistry[byte];

      if (!NodeClass) throw new UnsupportedOrderError(byte);

      nodes.push((node = new NodeClass()));
    }

    if (node && !node.isComplete())
      throw new IncompleteOrderError(node.constructor.name, node.data);

    return nodes;
  }

  private registerDefaultOrderNodeClasses(): void {
    this.registerOrderNodeClass(TN5250Orders.SBA, SetBufferAddressNode);
    this.registerOrderNodeClass(TN5250Orders.SF, StartFieldNode);
    this.registerOrderNodeClass(TN5250Orders.IC, InsertCursorNode);
    this.registerOrderNodeClass(TN5250Orders.MC, InsertCursorNode);
    this.registerOrderNodeClass(TN5250Orders.RA, RepeatToAddressNode);
  }
}
