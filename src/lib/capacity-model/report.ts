import { synthesizeFinancials } from "./financials";
import { createAssumptionSet } from "./schema";
import { availableMinutesPerAnalyst, claimsPerAnalystPerDay, solveStaffing } from "./staffing";
import type {
  AccountVolume,
  AssumptionSet,
  MonthlyProjection,
  Report,
  ReportSummary,
  SensitivityCell,
  SensitivityConfig,
  SensitivityGrid,
} from "./types";
import { projectVolumes } from "./volume";
import { claimTimeRange, estimateWorkload, minutesPerClaim } from "./workload";

export const projectMonth = (
  volume: AccountVolume,
  assumptions: AssumptionSet,
  perClaimMinutes: number,
): MonthlyProjection => {
  const workload = estimateWorkload(volume, assumptions, perClaimMinutes);
  const staffing = solveStaffing(workload, assumptions);
  const financials = synthesizeFinancials(volume, staffing, assumptions);

  return Object.freeze({
    monthIndex: volume.monthIndex,
    accountsAdded: volume.accountsAdded,
    activeAccounts: volume.activeAccounts,
    dailyClaimVolume: volume.dailyClaimVolume,
    monthlyClaimVolume: volume.monthlyClaimVolume,
    denialClaimVolume: workload.denialClaimVolume,
    newSubmissionMinutes: workload.newSubmission,
    denialMinutes: workload.denial,
    submissionAnalysts: staffing.submissionAnalysts,
    denialAnalysts: staffing.denialAnalysts,
    requiredAnalysts: staffing.analysts,
    requiredManagers: staffing.managers,
    totalStaff: staffing.analysts + staffing.managers,
    submissionSla: staffing.submissionSla,
    denialSla: staffing.denialSla,
    monthlyCost: financials.cost,
    monthlyRevenue: financials.revenue,
    grossProfit: financials.grossProfit,
    marginAchieved: financials.margin,
    marginGap: financials.marginGap,
  });
};

export const summarizeMonths = (
  months: readonly MonthlyProjection[],
  assumptions: AssumptionSet,
): ReportSummary => {
  const first = months[0];
  const last = months[months.length - 1];
  const breachedMonths = months
    .filter((month) => !month.submissionSla.withinSla || !month.denialSla.withinSla)
    .map((month) => month.monthIndex);

  return Object.freeze({
    horizonMonths: months.length,
    steadyState: Object.freeze({
      monthIndex: last.monthIndex,
      activeAccounts: last.activeAccounts,
      analysts: last.requiredAnalysts,
      managers: last.requiredManagers,
      totalStaff: last.totalStaff,
      monthlyCost: last.monthlyCost,
      monthlyRevenue: last.monthlyRevenue,
      margin: last.marginAchieved,
      marginGap: last.marginGap,
      meetsTargetMargin: last.marginAchieved >= assumptions.targetGrossMargin,
    }),
    sla: Object.freeze({
      submissionWithinSla: months.every((month) => month.submissionSla.withinSla),
      denialWithinSla: months.every((month) => month.denialSla.withinSla),
      breachedMonths: Object.freeze(breachedMonths),
    }),
    totals: Object.freeze({
      cost: months.reduce((sum, month) => sum + month.monthlyCost, 0),
      revenue: months.reduce((sum, month) => sum + month.monthlyRevenue, 0),
      grossProfit: months.reduce((sum, month) => sum + month.grossProfit, 0),
    }),
    rampDeltas: Object.freeze({
      margin: last.marginAchieved - first.marginAchieved,
      revenue: last.monthlyRevenue - first.monthlyRevenue,
      activeAccounts: last.activeAccounts - first.activeAccounts,
      totalStaff: last.totalStaff - first.totalStaff,
    }),
  });
};

/**
 * Runs volume, workload, staffing and financials for every month of the
 * horizon. The input is validated first, so nothing is computed for an
 * invalid assumption set.
 */
export const generateReport = (assumptions: AssumptionSet): Report => {
  const snapshot = createAssumptionSet(assumptions);
  const perClaimMinutes = minutesPerClaim(snapshot.processSteps);
  const availableMinutes = availableMinutesPerAnalyst(snapshot);
  const months = Object.freeze(
    projectVolumes(snapshot).map((volume) => projectMonth(volume, snapshot, perClaimMinutes)),
  );

  return Object.freeze({
    assumptions: snapshot,
    minutesPerClaim: perClaimMinutes,
    claimTimeRange: Object.freeze(claimTimeRange(snapshot.processSteps)),
    availableMinutesPerAnalyst: availableMinutes,
    claimsPerAnalystPerDay: claimsPerAnalystPerDay(availableMinutes, perClaimMinutes),
    months,
    summary: summarizeMonths(months, snapshot),
  });
};

export const buildSensitivityGrid = (
  assumptions: AssumptionSet,
  config: SensitivityConfig,
): SensitivityGrid =>
  config.approvalRates.map((targetApprovalRate) =>
    config.utilizationFactors.map((utilizationFactor) => {
      const report = generateReport({
        ...assumptions,
        targetApprovalRate,
        utilizationFactor,
      });

      const cell: SensitivityCell = {
        targetApprovalRate,
        utilizationFactor,
        steadyStateAnalysts: report.summary.steadyState.analysts,
        steadyStateMargin: report.summary.steadyState.margin,
      };

      return cell;
    }),
  );
