import type { TN5250OrderNode, TN5250Screen } from '../types';

/**
 * Run of screen attributes and characters between two orders.
 */
export class WriteDataNode implements TN5250OrderNode {
  readonly data: number[] = [];

  appendData(...data: number[]): void {
    this.data.push(...data);
  }

  isComplete(): boolean {
    return true;
  }

  execute(screen: TN5250Screen): boolean {
    screen.writeData(this.data);

    return true;
  }
}
