type Fraction = number;

export interface OnboardingEntry {
  monthIndex: number;
  accountsAdded: number;
}

export interface ProcessStep {
  name: string;
  minMinutes: number;
  maxMinutes: number;
  /** Replaces the min/max midpoint when set. */
  overrideMinutes?: number;
}

export interface AssumptionSet {
  readonly totalAccounts: number;
  readonly onboardingSchedule: readonly OnboardingEntry[];
  readonly totalClaimsValue: number;
  readonly avgClaimValue: number;
  /** Number of months `totalClaimsValue` is spread over. */
  readonly claimsPeriodMonths: number;
  readonly processSteps: readonly ProcessStep[];
  readonly targetApprovalRate: Fraction;
  readonly submissionSlaDays: number;
  readonly denialSlaDays: number;
  readonly revenuePercentage: Fraction;
  readonly targetGrossMargin: Fraction;
  readonly analystMonthlyCost: number;
  readonly managerMonthlyCost: number;
  readonly managerToAnalystRatio: number;
  readonly utilizationFactor: Fraction;
  readonly hoursPerDay: number;
  readonly daysPerMonth: number;
  /** Months appended after the last onboarding month to show equilibrium. */
  readonly steadyStateMonths: number;
}

export interface AccountVolume {
  readonly monthIndex: number;
  readonly accountsAdded: number;
  readonly activeAccounts: number;
  readonly dailyClaimVolume: number;
  readonly monthlyClaimVolume: number;
}

export interface WorkloadMinutes {
  readonly newSubmission: number;
  readonly denial: number;
  readonly denialClaimVolume: number;
}

export interface ClaimTimeRange {
  readonly minMinutes: number;
  readonly maxMinutes: number;
  readonly expectedMinutes: number;
}

export interface SlaAssessment {
  readonly slaDays: number;
  readonly backlogMinutes: number;
  readonly clearanceDays: number | null;
  readonly withinSla: boolean;
}

export interface Staffing {
  readonly submissionAnalysts: number;
  readonly denialAnalysts: number;
  readonly analysts: number;
  readonly managers: number;
  readonly submissionSla: SlaAssessment;
  readonly denialSla: SlaAssessment;
}

export interface Financials {
  readonly analystCost: number;
  readonly managerCost: number;
  readonly cost: number;
  readonly revenue: number;
  readonly grossProfit: number;
  readonly margin: number;
  readonly marginGap: number;
}

export interface MonthlyProjection {
  readonly monthIndex: number;
  readonly accountsAdded: number;
  readonly activeAccounts: number;
  readonly dailyClaimVolume: number;
  readonly monthlyClaimVolume: number;
  readonly denialClaimVolume: number;
  readonly newSubmissionMinutes: number;
  readonly denialMinutes: number;
  readonly submissionAnalysts: number;
  readonly denialAnalysts: number;
  readonly requiredAnalysts: number;
  readonly requiredManagers: number;
  readonly totalStaff: number;
  readonly submissionSla: SlaAssessment;
  readonly denialSla: SlaAssessment;
  readonly monthlyCost: number;
  readonly monthlyRevenue: number;
  readonly grossProfit: number;
  readonly marginAchieved: number;
  readonly marginGap: number;
}

export interface SteadyStateSummary {
  readonly monthIndex: number;
  readonly activeAccounts: number;
  readonly analysts: number;
  readonly managers: number;
  readonly totalStaff: number;
  readonly monthlyCost: number;
  readonly monthlyRevenue: number;
  readonly margin: number;
  readonly marginGap: number;
  readonly meetsTargetMargin: boolean;
}

export interface SlaSummary {
  readonly submissionWithinSla: boolean;
  readonly denialWithinSla: boolean;
  readonly breachedMonths: readonly number[];
}

export interface HorizonTotals {
  readonly cost: number;
  readonly revenue: number;
  readonly grossProfit: number;
}

export interface RampDeltas {
  readonly margin: number;
  readonly revenue: number;
  readonly activeAccounts: number;
  readonly totalStaff: number;
}

export interface ReportSummary {
  readonly horizonMonths: number;
  readonly steadyState: SteadyStateSummary;
  readonly sla: SlaSummary;
  readonly totals: HorizonTotals;
  readonly rampDeltas: RampDeltas;
}

export interface Report {
  readonly assumptions: AssumptionSet;
  readonly minutesPerClaim: number;
  readonly claimTimeRange: ClaimTimeRange;
  readonly availableMinutesPerAnalyst: number;
  readonly claimsPerAnalystPerDay: number;
  readonly months: readonly MonthlyProjection[];
  readonly summary: ReportSummary;
}

export interface SensitivityConfig {
  approvalRates: Fraction[];
  utilizationFactors: Fraction[];
}

export interface SensitivityCell {
  targetApprovalRate: Fraction;
  utilizationFactor: Fraction;
  steadyStateAnalysts: number;
  steadyStateMargin: number;
}

export type SensitivityGrid = SensitivityCell[][];
