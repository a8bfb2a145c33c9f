/**
 * Virtual register pool R1..Rk
 *
 * Owned by a single code generation run; the lowest free register is always
 * handed out first.
 */

import { RegisterBudgetExceededError } from '../expr/Errors.js';

export class RegisterPool {
  private inUse: boolean[] = [];
  private peak: number = 0;

  /**
   * @param budget - maximum number of registers; unbounded when undefined
   */
  constructor(private budget?: number) {}

  allocate(): string {
    let index = this.inUse.indexOf(false);
    if (index === -1) {
      index = this.inUse.length;
      if (this.budget !== undefined && index >= this.budget) {
        throw new RegisterBudgetExceededError(
          `no free register among R1..R${this.budget}`,
          this.budget,
          index + 1
        );
      }
      this.inUse.push(true);
    } else {
      this.inUse[index] = true;
    }

    this.peak = Math.max(this.peak, this.liveCount);
    return registerName(index);
  }

  release(register: string): void {
    const index = registerIndex(register);
    if (!this.inUse[index]) {
      throw new Error(`Register ${register} is not allocated`);
    }
    this.inUse[index] = false;
  }

  isLive(register: string): boolean {
    return this.inUse[registerIndex(register)] === true;
  }

  get liveCount(): number {
    return this.inUse.filter(Boolean).length;
  }

  /**
   * Largest number of registers live at the same time
   */
  get peakUsage(): number {
    return this.peak;
  }
}

export function registerName(index: number): string {
  return `R${index + 1}`;
}

function registerIndex(register: string): number {
  const match = /^R(\d+)$/.exec(register);
  if (!match) {
    throw new Error(`Invalid register name '${register}'`);
  }
  return Number(match[1]) - 1;
}
