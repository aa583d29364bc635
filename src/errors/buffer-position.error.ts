export class BufferPositionError extends RangeError {
  constructor(readonly position: number, readonly length: number) {
    super(`Buffer position ${position} outside of [0, ${length})`);
  }
}
