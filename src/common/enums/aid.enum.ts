export enum AID {
  NO_AID = 0x00,
  PF1 = 0x31,
  PF2 = 0x32,
  PF3 = 0x33,
  PF4 = 0x34,
  PF5 = 0x35,
  PF6 = 0x36,
  PF7 = 0x37,
  PF8 = 0x38,
  PF9 = 0x39,
  PF10 = 0x3a,
  PF11 = 0x3b,
  PF12 = 0x3c,
  PF13 = 0xb1,
  PF14 = 0xb2,
  PF15 = 0xb3,
  PF16 = 0xb4,
  PF17 = 0xb5,
  PF18 = 0xb6,
  PF19 = 0xb7,
  PF20 = 0xb8,
  PF21 = 0xb9,
  PF22 = 0xba,
  PF23 = 0xbb,
  PF24 = 0xbc,
  CLEAR = 0xbd,
  ENTER = 0xf1,
  HELP = 0xf3,
  ROLL_DOWN = 0xf4, // Page up
  ROLL_UP = 0xf5, // Page down
  PRINT = 0xf6,
  RECORD_BACKSPACE = 0xf8,
}

const FUNCTION_KEY_AIDS = [
  AID.PF1,
  AID.PF2,
  AID.PF3,
  AID.PF4,
  AID.PF5,
  AID.PF6,
  AID.PF7,
  AID.PF8,
  AID.PF9,
  AID.PF10,
  AID.PF11,
  AID.PF12,
  AID.PF13,
  AID.PF14,
  AID.PF15,
  AID.PF16,
  AID.PF17,
  AID.PF18,
  AID.PF19,
  AID.PF20,
  AID.PF21,
  AID.PF22,
  AID.PF23,
  AID.PF24,
];

export function functionKeyAid(key: number): AID | undefined {
  if (!Number.isInteger(key) || key < 1 || key > 24) return undefined;

  return FUNCTION_KEY_AIDS[key - 1];
}
