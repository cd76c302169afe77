import type { IncidentSeverity, RandomSource } from "@devteam-sim/core";

export interface Incident {
  id: string;
  createdDay: number;
  severity: IncidentSeverity;
  assignees: string[];
  estimatedHours: number;
  hoursInvested: number;
  resolvedDay?: number;
}

export interface IncidentOptions {
  /** Chance per developer per week of triggering an incident. */
  weeklyRatePerDeveloper: number;
  /** Working hours per day an assignee puts in, before availability. */
  hoursPerDay: number;
}

interface SeverityBand {
  upTo: number;
  severity: IncidentSeverity;
  hours: number;
}

// Cumulative roll thresholds: critical 10%, high 20%, medium 40%, low 30%.
const SEVERITY_BANDS: SeverityBand[] = [
  { upTo: 0.1, severity: "critical", hours: 16 },
  { upTo: 0.3, severity: "high", hours: 12 },
  { upTo: 0.7, severity: "medium", hours: 8 },
  { upTo: 1, severity: "low", hours: 4 },
];

export function severityForRoll(roll: number): { severity: IncidentSeverity; hours: number } {
  const band = SEVERITY_BANDS.find((b) => roll < b.upTo) ?? SEVERITY_BANDS[SEVERITY_BANDS.length - 1];
  return { severity: band.severity, hours: band.hours };
}

/**
 * Production incidents. Assignees are pulled off PR work until enough hours
 * have gone into the incident to resolve it.
 */
export class IncidentTracker {
  private incidents: Incident[] = [];

  constructor(private readonly options: IncidentOptions) {}

  /**
   * Daily trigger probability per developer. Debt and recent reverts make
   * incidents more likely.
   */
  dailyProbability(debtImpact: number, recentReverts: number): number {
    return (this.options.weeklyRatePerDeveloper / 7) * (1 + debtImpact) * (1 + 0.1 * recentReverts);
  }

  /** Roll for a new incident and staff it from `responders`. */
  open(day: number, rng: RandomSource, responders: readonly string[]): Incident | null {
    if (responders.length === 0) return null;

    const { severity, hours } = severityForRoll(rng.next());
    const assignees =
      severity === "critical"
        ? rng.sample(responders, Math.min(responders.length, rng.int(2, 3)))
        : rng.sample(responders, 1);

    const incident: Incident = {
      id: `inc-${String(this.incidents.length + 1).padStart(4, "0")}`,
      createdDay: day,
      severity,
      assignees,
      estimatedHours: hours,
      hoursInvested: 0,
    };
    this.incidents.push(incident);
    return incident;
  }

  /** Agents currently assigned to an unresolved incident. */
  onDuty(): Set<string> {
    const duty = new Set<string>();
    for (const incident of this.getActive()) {
      for (const id of incident.assignees) duty.add(id);
    }
    return duty;
  }

  /**
   * Book a day of work. `availabilityOf` returns 0 for assignees who are not
   * working today. Returns the incidents resolved by this work.
   */
  work(day: number, availabilityOf: (agentId: string) => number): Incident[] {
    const resolved: Incident[] = [];
    for (const incident of this.getActive()) {
      for (const id of incident.assignees) {
        incident.hoursInvested += this.options.hoursPerDay * availabilityOf(id);
      }
      if (incident.hoursInvested >= incident.estimatedHours) {
        incident.resolvedDay = day;
        resolved.push(incident);
      }
    }
    return resolved;
  }

  getActive(): Incident[] {
    return this.incidents.filter((i) => i.resolvedDay === undefined);
  }
}
