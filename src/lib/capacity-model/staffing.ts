import { ConfigurationError } from "./errors";
import type { AssumptionSet, SlaAssessment, Staffing, WorkloadMinutes } from "./types";

const MINUTES_PER_HOUR = 60;
// Absorbs float noise such as 12.000000000000002 analysts before rounding up.
const HEADCOUNT_TOLERANCE = 1e-9;

const floorZero = (value: number): number => (Number.isFinite(value) ? Math.max(0, value) : 0);

export const ceilHeadcount = (value: number): number =>
  Math.max(0, Math.ceil(floorZero(value) - HEADCOUNT_TOLERANCE));

export const availableMinutesPerAnalyst = (assumptions: AssumptionSet): number => {
  const minutes = assumptions.hoursPerDay * MINUTES_PER_HOUR * assumptions.utilizationFactor;

  if (!Number.isFinite(minutes) || minutes <= 0) {
    throw new ConfigurationError([
      {
        path: "utilizationFactor",
        message: "Hours per day and utilization must leave productive minutes for each analyst.",
      },
    ]);
  }

  return minutes;
};

export const claimsPerAnalystPerDay = (availableMinutes: number, perClaimMinutes: number): number =>
  perClaimMinutes > 0 ? availableMinutes / perClaimMinutes : 0;

export const requiredAnalysts = (dailyMinutes: number, availableMinutes: number): number =>
  ceilHeadcount(dailyMinutes / availableMinutes);

export const requiredManagers = (analysts: number, managerToAnalystRatio: number): number =>
  ceilHeadcount(analysts / managerToAnalystRatio);

/**
 * Days a stream's pool needs to clear the work that builds up over one SLA
 * window. `clearanceDays` is null when there is work but nobody to do it.
 */
export const assessSla = (
  dailyMinutes: number,
  analysts: number,
  availableMinutes: number,
  slaDays: number,
): SlaAssessment => {
  const backlogMinutes = floorZero(dailyMinutes) * slaDays;
  const dailyCapacity = floorZero(analysts) * floorZero(availableMinutes);

  let clearanceDays: number | null;
  if (backlogMinutes === 0) {
    clearanceDays = 0;
  } else if (dailyCapacity > 0) {
    clearanceDays = backlogMinutes / dailyCapacity;
  } else {
    clearanceDays = null;
  }

  return Object.freeze({
    slaDays,
    backlogMinutes,
    clearanceDays,
    withinSla: clearanceDays !== null && clearanceDays <= slaDays,
  });
};

export const solveStaffing = (workload: WorkloadMinutes, assumptions: AssumptionSet): Staffing => {
  const availableMinutes = availableMinutesPerAnalyst(assumptions);
  const submissionAnalysts = requiredAnalysts(workload.newSubmission, availableMinutes);
  const denialAnalysts = requiredAnalysts(workload.denial, availableMinutes);
  // Dedicated pools: submission and denial analysts are not shared.
  const analysts = submissionAnalysts + denialAnalysts;

  return {
    submissionAnalysts,
    denialAnalysts,
    analysts,
    managers: requiredManagers(analysts, assumptions.managerToAnalystRatio),
    submissionSla: assessSla(
      workload.newSubmission,
      submissionAnalysts,
      availableMinutes,
      assumptions.submissionSlaDays,
    ),
    denialSla: assessSla(workload.denial, denialAnalysts, availableMinutes, assumptions.denialSlaDays),
  };
};
