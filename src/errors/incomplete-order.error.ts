export class IncompleteOrderError extends Error {
  constructor(readonly node: string, readonly received: number[]) {
    super(`Order data ended inside ${node} after ${received.length} bytes`);
  }
}
