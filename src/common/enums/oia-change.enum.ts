export enum OIAChange {
  INSERT_MODE = 'insert-mode',
  KEYBOARD_LOCKED = 'keyboard-locked',
  MESSAGE_LIGHT = 'message-light',
  SCRIPT = 'script',
  BELL = 'bell',
  CLEAR_SCREEN = 'clear-screen',
  INPUT_INHIBITED = 'input-inhibited',
  KEYS_BUFFERED = 'keys-buffered',
}
