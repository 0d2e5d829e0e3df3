import type { Report } from "@/lib/capacity-model/types";
import { formatCurrency, formatNumber, formatPercent, type CurrencyCode } from "@/lib/format";

export interface TableOptions {
  locale: string;
  currency: CurrencyCode;
}

export type ReportRow = Record<string, string>;

const yesNo = (value: boolean): string => (value ? "Yes" : "No");

export const buildReportRows = (report: Report, { locale, currency }: TableOptions): ReportRow[] =>
  report.months.map((month) => ({
    Month: String(month.monthIndex),
    "Active Accounts": formatNumber(month.activeAccounts, locale, { fractionDigits: 0 }),
    "Monthly Claims": formatNumber(month.monthlyClaimVolume, locale, { fractionDigits: 0 }),
    "Daily Claims": formatNumber(month.dailyClaimVolume, locale),
    "Submission Analysts": String(month.submissionAnalysts),
    "Denial Analysts": String(month.denialAnalysts),
    Managers: String(month.requiredManagers),
    "Labor Cost": formatCurrency(month.monthlyCost, locale, currency),
    "Monthly Revenue": formatCurrency(month.monthlyRevenue, locale, currency),
    "Gross Margin": formatPercent(month.marginAchieved, locale),
    "Within SLA": yesNo(month.submissionSla.withinSla && month.denialSla.withinSla),
  }));

export const buildSummaryLines = (report: Report, { locale, currency }: TableOptions): string[] => {
  const { steadyState, sla, totals } = report.summary;

  return [
    `Time per claim: ${formatNumber(report.minutesPerClaim, locale)} min (range ${formatNumber(report.claimTimeRange.minMinutes, locale, { fractionDigits: 0 })}-${formatNumber(report.claimTimeRange.maxMinutes, locale, { fractionDigits: 0 })} min)`,
    `Claims per analyst per day: ${formatNumber(report.claimsPerAnalystPerDay, locale)}`,
    `Steady state (month ${steadyState.monthIndex}): ${steadyState.analysts} analysts, ${steadyState.managers} managers`,
    `Steady-state margin: ${formatPercent(steadyState.margin, locale)} (target ${formatPercent(report.assumptions.targetGrossMargin, locale)}, ${steadyState.meetsTargetMargin ? "met" : "missed"})`,
    `Horizon cost ${formatCurrency(totals.cost, locale, currency)}, revenue ${formatCurrency(totals.revenue, locale, currency)}`,
    `Submission SLA: ${sla.submissionWithinSla ? "met" : "breached"}; denial SLA: ${sla.denialWithinSla ? "met" : "breached"}`,
  ];
};
