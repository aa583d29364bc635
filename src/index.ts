export { TN5250Screen, TN5250_MODELS } from './tn5250-screen';
export type {
  AttributeColor,
  AttributeDescription,
  CodePage,
  CodePageTranslator,
  CursorAddress,
  CursorState,
  ExtendedAttributes,
  FieldFormat,
  Logger as ILogger,
  LogLevel,
  OIAListener,
  TerminalModel,
  TerminalScreenSize,
  TN5250Events,
  TN5250OrderNode,
  TN5250ScreenOptions,
} from './types';
export { TN5250ScreenBuffer, EMPTY_CHAR } from './tn5250-screen-buffer';
export { TN5250Field } from './tn5250-field';
export { TN5250FieldTable } from './tn5250-field-table';
export { TN5250Cursor } from './tn5250-cursor';
export { TN5250OIA } from './tn5250-oia';
export {
  TN5250AidResponseBuilder,
  FIELD_LOCATION_TAG,
  MAX_FIELD_DATA_LENGTH,
} from './tn5250-aid-response-builder';
export {
  describeAttribute,
  decodeExtendedFlags,
  extendedFlagsFor,
  isAttributeByte,
} from './tn5250-attributes';
export { EbcdicCP37Translator } from './translate/ebcdic-cp-37.translator';
export { Logger } from './logger';
export * from './errors';
export * from './common/enums';
