import type { TN5250OrderNode, TN5250Screen } from '../types';

export class RepeatToAddressNode implements TN5250OrderNode {
  readonly data: number[] = [];

  appendData(...data: number[]): void {
    this.data.push(...data);
  }

  isComplete(): boolean {
    return this.data.length >= 3;
  }

  execute(screen: TN5250Screen): boolean {
    const [row, column, char] = this.data;

    return screen.repeatToAddress(row, column, char);
  }
}
