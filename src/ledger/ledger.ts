import type { BalanceSnapshot, LedgerSnapshot } from "../contracts/checkpoint.schema";

export type ThinkingCharge = {
  success: boolean;
  cost: number;
};

function isNonNegativeInt(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function isNonNegativeNumber(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Per-principal balance store for scrip (transferable) and compute
 * (non-transferable, reset every tick).
 *
 * Every method is synchronous. Sandboxed code reaches a ledger only through
 * messages handled on the owning thread, so a check and the mutation that
 * follows it are never interleaved with another caller.
 */
export class Ledger {
  private readonly scrip = new Map<string, number>();
  private readonly compute = new Map<string, number>();

  public static restore(snapshot: LedgerSnapshot): Ledger {
    const ledger = new Ledger();
    for (const [id, balance] of Object.entries(snapshot)) {
      ledger.createPrincipal(id, balance.scrip, balance.compute);
    }
    return ledger;
  }

  /** Initializes or overwrites a principal. */
  public createPrincipal(id: string, startingScrip: number, startingCompute = 0): boolean {
    if (!isNonNegativeInt(startingScrip) || !isNonNegativeInt(startingCompute)) {
      return false;
    }
    this.scrip.set(id, startingScrip);
    this.compute.set(id, startingCompute);
    return true;
  }

  public hasPrincipal(id: string): boolean {
    return this.scrip.has(id) || this.compute.has(id);
  }

  public getScrip(id: string): number {
    return this.scrip.get(id) ?? 0;
  }

  public getCompute(id: string): number {
    return this.compute.get(id) ?? 0;
  }

  public canAffordScrip(id: string, amount: number): boolean {
    return this.getScrip(id) >= amount;
  }

  public canSpendCompute(id: string, amount: number): boolean {
    return this.getCompute(id) >= amount;
  }

  public transferScrip(fromId: string, toId: string, amount: number): boolean {
    if (!Number.isInteger(amount) || amount <= 0) return false;
    if (!this.canAffordScrip(fromId, amount)) return false;
    if (!this.scrip.has(toId)) return false;
    if (fromId === toId) return true;
    this.scrip.set(fromId, this.getScrip(fromId) - amount);
    this.scrip.set(toId, this.getScrip(toId) + amount);
    return true;
  }

  public deductScrip(id: string, amount: number): boolean {
    if (!isNonNegativeInt(amount)) return false;
    if (amount === 0) return true;
    if (!this.canAffordScrip(id, amount)) return false;
    this.scrip.set(id, this.getScrip(id) - amount);
    return true;
  }

  /** Mints scrip; creates the principal when absent. */
  public creditScrip(id: string, amount: number): boolean {
    if (!isNonNegativeInt(amount)) return false;
    this.scrip.set(id, this.getScrip(id) + amount);
    if (!this.compute.has(id)) this.compute.set(id, 0);
    return true;
  }

  public spendCompute(id: string, amount: number): boolean {
    if (!isNonNegativeInt(amount)) return false;
    if (amount === 0) return true;
    if (!this.canSpendCompute(id, amount)) return false;
    this.compute.set(id, this.getCompute(id) - amount);
    return true;
  }

  public resetCompute(id: string, quota: number): boolean {
    if (!isNonNegativeInt(quota)) return false;
    this.compute.set(id, quota);
    if (!this.scrip.has(id)) this.scrip.set(id, 0);
    return true;
  }

  /** Compute units for a model call, rounded up. Rates are units per 1K tokens. */
  public calculateThinkingCost(
    inputTokens: number,
    outputTokens: number,
    rateInput: number,
    rateOutput: number
  ): number {
    const inputCost = (inputTokens / 1000) * rateInput;
    const outputCost = (outputTokens / 1000) * rateOutput;
    return Math.ceil(inputCost + outputCost);
  }

  public deductThinkingCost(
    id: string,
    inputTokens: number,
    outputTokens: number,
    rateInput: number,
    rateOutput: number
  ): ThinkingCharge {
    if (
      !isNonNegativeNumber(inputTokens) ||
      !isNonNegativeNumber(outputTokens) ||
      !isNonNegativeNumber(rateInput) ||
      !isNonNegativeNumber(rateOutput)
    ) {
      return { success: false, cost: 0 };
    }
    const cost = this.calculateThinkingCost(inputTokens, outputTokens, rateInput, rateOutput);
    return { success: this.spendCompute(id, cost), cost };
  }

  public getAllBalances(): LedgerSnapshot {
    return Object.fromEntries(this.principalIds().map((id) => [id, this.balanceOf(id)]));
  }

  public getAllScrip(): Record<string, number> {
    return Object.fromEntries(this.scrip);
  }

  public getAllCompute(): Record<string, number> {
    return Object.fromEntries(this.compute);
  }

  public snapshot(): LedgerSnapshot {
    return this.getAllBalances();
  }

  public totalScrip(): number {
    let total = 0;
    for (const amount of this.scrip.values()) total += amount;
    return total;
  }

  private principalIds(): string[] {
    return [...new Set([...this.scrip.keys(), ...this.compute.keys()])].sort();
  }

  private balanceOf(id: string): BalanceSnapshot {
    return { scrip: this.getScrip(id), compute: this.getCompute(id) };
  }
}
