export enum Plane {
  TEXT = 0,
  ATTRIBUTE = 1,
  EXTENDED = 2,
  RENDERER = 3,
}
