import type { AccountVolume, AssumptionSet, Financials, Staffing } from "./types";

const floorZero = (value: number): number => (Number.isFinite(value) ? Math.max(0, value) : 0);

/** Base salary scaled for benefits and overhead. */
export const fullyLoadedCost = (baseSalary: number, multiplier: number): number =>
  floorZero(baseSalary) * floorZero(multiplier);

export const calculateLaborCost = (
  staffing: Pick<Staffing, "analysts" | "managers">,
  assumptions: AssumptionSet,
) => {
  const analystCost = staffing.analysts * assumptions.analystMonthlyCost;
  const managerCost = staffing.managers * assumptions.managerMonthlyCost;

  return {
    analystCost,
    managerCost,
    cost: analystCost + managerCost,
  };
};

export const calculateApprovedRevenue = (
  volume: Pick<AccountVolume, "dailyClaimVolume">,
  assumptions: AssumptionSet,
): number =>
  floorZero(
    volume.dailyClaimVolume *
      assumptions.daysPerMonth *
      assumptions.avgClaimValue *
      assumptions.targetApprovalRate *
      assumptions.revenuePercentage,
  );

// A month with no claims has no revenue; its margin is reported as 0.
export const calculateMargin = (revenue: number, cost: number): number =>
  revenue > 0 ? (revenue - cost) / revenue : 0;

export const synthesizeFinancials = (
  volume: Pick<AccountVolume, "dailyClaimVolume">,
  staffing: Pick<Staffing, "analysts" | "managers">,
  assumptions: AssumptionSet,
): Financials => {
  const { analystCost, managerCost, cost } = calculateLaborCost(staffing, assumptions);
  const revenue = calculateApprovedRevenue(volume, assumptions);
  const margin = calculateMargin(revenue, cost);

  return {
    analystCost,
    managerCost,
    cost,
    revenue,
    grossProfit: revenue - cost,
    margin,
    marginGap: assumptions.targetGrossMargin - margin,
  };
};
