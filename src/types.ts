import type {
  OIAChange,
  ResponseFormat,
  ShiftType,
} from './common/enums';

export type CodePage = '37';

export type TerminalModel = '3179-2' | '3180-2' | '3196-A1' | '3477-FC';

export type TerminalScreenSize = { rows: number; columns: number };

export type LogLevel = 'debug' | 'log' | 'warn' | 'error';

export interface Logger {
  debug(message: unknown, ...args: unknown[]): void;
  log(message: unknown, ...args: unknown[]): void;
  warn(message: unknown, ...args: unknown[]): void;
  error(message: unknown, ...args: unknown[]): void;
}

export interface CodePageTranslator {
  toEBCDIC(text: string): number[];
  fromEBCDIC(data: number[]): string;
}

export interface TN5250ScreenBufferOptions {
  rows: number;
  columns: number;
  errorLine?: number;
  logger?: Logger;
}

export interface TN5250ScreenOptions {
  model?: TerminalModel;
  rows?: number;
  columns?: number;
  codePage?: CodePage | string;
  codePageTranslator?: CodePageTranslator;
  responseFormat?: ResponseFormat;
  errorLine?: number;
  logger?: Logger;
}

export interface ExtendedAttributes {
  underline: boolean;
  columnSeparator: boolean;
  nonDisplay: boolean;
}

export type AttributeColor =
  | 'green'
  | 'white'
  | 'red'
  | 'turquoise'
  | 'yellow'
  | 'pink'
  | 'blue';

export interface AttributeDescription extends ExtendedAttributes {
  color: AttributeColor;
  reverse: boolean;
  blink: boolean;
}

export interface FieldFormat {
  attribute: number;
  length: number;
  ffw1: number;
  ffw2: number;
  fcw1: number;
  fcw2: number;
}

export interface TN5250FieldOptions extends FieldFormat {
  startPos: number;
}

export interface TN5250Field {
  readonly startPos: number;
  readonly endPos: number;
  readonly shiftType: ShiftType;
  readonly attribute: number;
  readonly cursorProgression: number;
  getLength(): number;
  contains(position: number): boolean;
  isBypassField(): boolean;
  isProtected(): boolean;
  isNumeric(): boolean;
  isSignedNumeric(): boolean;
  isMandatoryEnter(): boolean;
  isFER(): boolean;
  isDupEnabled(): boolean;
  isToUpper(): boolean;
  isAutoEnter(): boolean;
  isModified(): boolean;
  isContinued(): boolean;
  isContinuedFirst(): boolean;
  isContinuedMiddle(): boolean;
  isContinuedLast(): boolean;
  getAdjustment(): number;
}

export interface CursorState {
  position: number;
  active: boolean;
  visible: boolean;
}

export interface CursorAddress {
  row: number;
  column: number;
}

export interface AidResponseOptions {
  codePageTranslator: CodePageTranslator;
  responseFormat?: ResponseFormat;
  logger?: Logger;
}

export type OIAListener<T> = (oia: T, change: OIAChange) => void;

export interface TN5250Screen {
  setBufferAddress(row: number, column: number): boolean;
  startField(format: FieldFormat): TN5250Field;
  insertCursor(row: number, column: number): boolean;
  repeatToAddress(row: number, column: number, char: number): boolean;
  writeData(data: number[]): void;
}

export interface Node {
  readonly data: number[];
  appendData(...data: number[]): void;
  isComplete(): boolean;
}

export interface Executor<T, R = void> {
  execute(dependency: T): R;
}

export type TN5250OrderNode = Node & Executor<TN5250Screen, boolean>;

export type Type<T> = new () => T;

export type Registry<I extends number | string, T> = Record<I, T>;

export type OrderNodeClassRegistry = Partial<
  Registry<number, Type<TN5250OrderNode>>
>;

export type CodePageTranslatorRegistry = Partial<
  Registry<string, CodePageTranslator>
>;

export type TN5250Events = 'screen-update' | 'aid';
