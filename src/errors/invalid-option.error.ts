export class InvalidOptionError extends Error {
  constructor(readonly option: string, readonly value: unknown) {
    super(`Invalid option: ${option}=${String(value)}`);
  }
}
