import type { AgentKind, ExperienceLevel } from "@devteam-sim/core";
import type { AgentProfile, SimulationContext } from "./agent.js";
import { BaseAgent, type BaseAgentParams } from "./base-agent.js";

export const EXPERIENCE_MULTIPLIERS: Record<ExperienceLevel, number> = {
  junior: 0.5,
  mid: 1.0,
  senior: 1.3,
  staff: 1.5,
  principal: 1.7,
};

const HOURS_PER_WEEK = 40;

export interface DeveloperParams extends Omit<BaseAgentParams, "workingDaysPerWeek"> {
  experienceLevel: ExperienceLevel;
  onboardingWeeks: number;
  tenureWeeks: number;
  meetingHoursPerWeek: number;
  /** Fraction of quality kept at the very start of the ramp. */
  onboardingQualityFloor: number;
  workingDaysPerWeek?: number;
}

/**
 * Onboarding ramp: fraction of full productivity after `weeksInRole` weeks.
 * Non-decreasing in `weeksInRole`, capped at 1.
 */
export function onboardingMultiplier(weeksInRole: number, onboardingWeeks: number): number {
  if (onboardingWeeks <= 0) return 1;
  return Math.min(1, Math.max(0, weeksInRole) / onboardingWeeks);
}

/** A human developer with an onboarding ramp and meeting load. */
export class HumanDeveloper extends BaseAgent {
  readonly kind: AgentKind = "human";

  private readonly experienceLevel: ExperienceLevel;
  private readonly onboardingWeeks: number;
  private readonly meetingHoursPerWeek: number;
  private readonly onboardingQualityFloor: number;
  private readonly tenureWeeks: number;

  private weeksInRole: number;
  private rampMultiplier: number;

  constructor(params: DeveloperParams) {
    super({ ...params, workingDaysPerWeek: params.workingDaysPerWeek ?? 5 });
    this.experienceLevel = params.experienceLevel;
    this.onboardingWeeks = params.onboardingWeeks;
    this.meetingHoursPerWeek = params.meetingHoursPerWeek;
    this.onboardingQualityFloor = params.onboardingQualityFloor;
    this.tenureWeeks = params.tenureWeeks;
    this.weeksInRole = params.tenureWeeks;
    this.rampMultiplier = onboardingMultiplier(this.weeksInRole, this.onboardingWeeks);
  }

  // weeksInRole counts the week in progress, so day 0 is week 1 of tenure.
  protected override observeDay(context: SimulationContext): void {
    const tenure = this.tenureWeeks + context.currentWeek + 1;
    if (tenure > this.weeksInRole) {
      this.weeksInRole = tenure;
      this.rampMultiplier = onboardingMultiplier(this.weeksInRole, this.onboardingWeeks);
    }
  }

  protected productionMultiplier(): number {
    return this.rampMultiplier * EXPERIENCE_MULTIPLIERS[this.experienceLevel];
  }

  effectiveQuality(): number {
    const floor = this.onboardingQualityFloor;
    const scaled = this.quality * (floor + (1 - floor) * this.rampMultiplier);
    return Math.min(1, Math.max(0, scaled));
  }

  override effectiveAvailability(): number {
    const meetingShare = Math.min(1, Math.max(0, this.meetingHoursPerWeek / HOURS_PER_WEEK));
    return this.availability * (1 - meetingShare);
  }

  protected costPerPr(): number {
    return 0;
  }

  protected supervisionFactor(): number {
    return 1;
  }

  canReview(_authorKind: AgentKind): boolean {
    return this.reviewCapacity > 0 && this.effectiveAvailability() > 0;
  }

  describe(): AgentProfile {
    return {
      id: this.id,
      name: this.name,
      kind: this.kind,
      experienceLevel: this.experienceLevel,
      specializations: [...this.specializations],
      weeksInRole: this.weeksInRole,
      productivityMultiplier: this.rampMultiplier,
    };
  }
}
