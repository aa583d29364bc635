export enum TN5250Orders {
  SOH = 0x01, // Start of Header
  RA = 0x02, // Repeat to Address
  EA = 0x03, // Erase to Address
  TD = 0x10, // Transparent Data
  SBA = 0x11, // Set Buffer Address
  WEA = 0x12, // Write Extended Attribute
  IC = 0x13, // Insert Cursor
  MC = 0x14, // Move Cursor
  WDSF = 0x15, // Write to Display Structured Field
  SF = 0x1d, // Start Field
}
