import type { AccountVolume, AssumptionSet, ClaimTimeRange, ProcessStep, WorkloadMinutes } from "./types";

const floorZero = (value: number): number => (Number.isFinite(value) ? Math.max(0, value) : 0);

export const stepMinutes = (step: ProcessStep): number =>
  floorZero(step.overrideMinutes ?? (step.minMinutes + step.maxMinutes) / 2);

export const minutesPerClaim = (steps: readonly ProcessStep[]): number =>
  steps.reduce((total, step) => total + stepMinutes(step), 0);

export const claimTimeRange = (steps: readonly ProcessStep[]): ClaimTimeRange => ({
  minMinutes: steps.reduce((total, step) => total + floorZero(step.minMinutes), 0),
  maxMinutes: steps.reduce((total, step) => total + floorZero(step.maxMinutes), 0),
  expectedMinutes: minutesPerClaim(steps),
});

/**
 * Daily processing minutes for the new-submission and denial streams.
 * Pass `perClaimMinutes` to reuse a figure already derived from the steps.
 */
export const estimateWorkload = (
  volume: Pick<AccountVolume, "dailyClaimVolume">,
  assumptions: AssumptionSet,
  perClaimMinutes: number = minutesPerClaim(assumptions.processSteps),
): WorkloadMinutes => {
  const dailyClaims = floorZero(volume.dailyClaimVolume);
  const denialRate = floorZero(1 - assumptions.targetApprovalRate);
  const denialClaimVolume = dailyClaims * denialRate;

  return {
    newSubmission: dailyClaims * perClaimMinutes,
    denial: denialClaimVolume * perClaimMinutes,
    denialClaimVolume,
  };
};
