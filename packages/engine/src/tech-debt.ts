import type { RandomSource } from "@devteam-sim/core";

export interface TechDebtItem {
  id: string;
  createdDay: number;
  prId: string;
  /** 0.5 minor … 2.0 severe */
  severity: number;
  productivityImpact: number;
  paidDay?: number;
}

export interface TechDebtOptions {
  /** Probability that a merged latent failure leaves debt behind. */
  accumulationRate: number;
  /** Weekly probability that each active item is paid down. */
  paydownProbability: number;
  /** Upper bound on the combined productivity impact. */
  maxImpact: number;
}

/**
 * Debt left behind by low-quality merges. Each active item slows the team by
 * `0.01 × severity`; the total is capped at `maxImpact`.
 */
export class TechDebtTracker {
  private items: TechDebtItem[] = [];

  constructor(private readonly options: TechDebtOptions) {}

  /** Severity grows as author quality drops: quality 0.85 gives 1.15. */
  static severityFor(authorQuality: number): number {
    return Math.min(2, Math.max(0.5, 2 - authorQuality));
  }

  add(day: number, prId: string, authorQuality: number): TechDebtItem {
    const severity = TechDebtTracker.severityFor(authorQuality);
    const item: TechDebtItem = {
      id: `td-${String(this.items.length + 1).padStart(4, "0")}`,
      createdDay: day,
      prId,
      severity,
      productivityImpact: 0.01 * severity,
    };
    this.items.push(item);
    return item;
  }

  /** Whether a merged latent failure accrues debt. */
  shouldAccrue(rng: RandomSource): boolean {
    return rng.chance(this.options.accumulationRate);
  }

  /** Pay off an item. Returns false if it was already paid. */
  payOff(item: TechDebtItem, day: number): boolean {
    if (item.paidDay !== undefined) return false;
    item.paidDay = day;
    return true;
  }

  /** Active debt caused by one PR (reverting the PR removes it). */
  activeForPr(prId: string): TechDebtItem[] {
    return this.getActive().filter((d) => d.prId === prId);
  }

  /** One weekly paydown pass. Returns the items paid. */
  paydown(rng: RandomSource, day: number): TechDebtItem[] {
    const paid: TechDebtItem[] = [];
    for (const item of this.getActive()) {
      if (rng.chance(this.options.paydownProbability) && this.payOff(item, day)) {
        paid.push(item);
      }
    }
    return paid;
  }

  getActive(): TechDebtItem[] {
    return this.items.filter((d) => d.paidDay === undefined);
  }

  getTotalImpact(): number {
    const total = this.getActive().reduce((sum, d) => sum + d.productivityImpact, 0);
    return Math.min(total, this.options.maxImpact);
  }
}
