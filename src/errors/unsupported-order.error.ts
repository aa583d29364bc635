export class UnsupportedOrderError extends Error {
  constructor(readonly order: number) {
    super(`Unsupported order: 0x${order.toString(16).padStart(2, '0')}`);
  }
}
