import { ConfigurationError, type ConfigurationIssue } from "./errors";
import type { AccountVolume, AssumptionSet, OnboardingEntry } from "./types";

export const findOnboardingIssues = (
  schedule: readonly OnboardingEntry[],
  totalAccounts: number,
): ConfigurationIssue[] => {
  const issues: ConfigurationIssue[] = [];
  const seenMonths = new Set<number>();
  let scheduledAccounts = 0;

  schedule.forEach((entry, index) => {
    if (entry.monthIndex < 0) {
      issues.push({
        path: `onboardingSchedule.${index}.monthIndex`,
        message: "Month index cannot be negative.",
      });
    }

    if (entry.accountsAdded < 0) {
      issues.push({
        path: `onboardingSchedule.${index}.accountsAdded`,
        message: "Accounts added cannot be negative.",
      });
    }

    if (seenMonths.has(entry.monthIndex)) {
      issues.push({
        path: `onboardingSchedule.${index}.monthIndex`,
        message: `Month ${entry.monthIndex} is scheduled more than once.`,
      });
    }

    seenMonths.add(entry.monthIndex);
    scheduledAccounts += entry.accountsAdded;
  });

  if (scheduledAccounts > totalAccounts) {
    issues.push({
      path: "onboardingSchedule",
      message: `Schedule onboards ${scheduledAccounts} accounts but only ${totalAccounts} exist.`,
    });
  }

  return issues;
};

export const impliedClaimCount = (assumptions: AssumptionSet): number =>
  assumptions.avgClaimValue > 0 ? assumptions.totalClaimsValue / assumptions.avgClaimValue : 0;

export const dailyClaimsPerAccount = (assumptions: AssumptionSet): number => {
  const { totalAccounts, claimsPeriodMonths, daysPerMonth } = assumptions;

  if (totalAccounts <= 0 || claimsPeriodMonths <= 0 || daysPerMonth <= 0) {
    return 0;
  }

  return impliedClaimCount(assumptions) / totalAccounts / claimsPeriodMonths / daysPerMonth;
};

/**
 * Month indices covered by a report: from month 1 (month 0 when the schedule
 * starts there) through the last onboarding month plus the steady-state tail.
 */
export const projectionMonths = (assumptions: AssumptionSet): number[] => {
  const scheduled = assumptions.onboardingSchedule.map((entry) => entry.monthIndex);

  if (scheduled.length === 0) {
    return [];
  }

  const firstMonth = Math.min(1, ...scheduled);
  const lastMonth = Math.max(...scheduled) + Math.max(0, assumptions.steadyStateMonths);
  const months: number[] = [];

  for (let monthIndex = firstMonth; monthIndex <= lastMonth; monthIndex += 1) {
    months.push(monthIndex);
  }

  return months;
};

export const projectVolumes = (assumptions: AssumptionSet): AccountVolume[] => {
  const issues = findOnboardingIssues(assumptions.onboardingSchedule, assumptions.totalAccounts);

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const addedByMonth = new Map<number, number>(
    assumptions.onboardingSchedule.map((entry): [number, number] => [entry.monthIndex, entry.accountsAdded]),
  );
  const perAccountDaily = dailyClaimsPerAccount(assumptions);
  let activeAccounts = 0;

  return projectionMonths(assumptions).map((monthIndex) => {
    const accountsAdded = addedByMonth.get(monthIndex) ?? 0;
    activeAccounts += accountsAdded;
    const dailyClaimVolume = activeAccounts * perAccountDaily;

    return Object.freeze({
      monthIndex,
      accountsAdded,
      activeAccounts,
      dailyClaimVolume,
      monthlyClaimVolume: dailyClaimVolume * assumptions.daysPerMonth,
    });
  });
};
