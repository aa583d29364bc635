import type { TN5250OrderNode, TN5250Screen } from '../types';

export class SetBufferAddressNode implements TN5250OrderNode {
  readonly data: number[] = [];

  appendData(...data: number[]): void {
    this.data.push(...data);
  }

  isComplete(): boolean {
    return this.data.length >= 2;
  }

  execute(screen: TN5250Screen): boolean {
    const [row, column] = this.data;

    return screen.setBufferAddress(row, column);
  }
}
