import { z } from "zod";

import { ConfigurationError } from "./errors";
import { fullyLoadedCost } from "./financials";
import type { AssumptionSet } from "./types";
import { findOnboardingIssues } from "./volume";

// Upper bound for an onboarding month and for the steady-state tail.
export const MAX_PROJECTION_MONTHS = 24;

const finiteNumber = () => z.coerce.number().finite({ message: "Must be a finite number." });

// Helper to coerce input to number and apply min/max
const num = (min?: number, max?: number) => {
  let s = finiteNumber();
  if (min !== undefined) s = s.min(min, { message: `Must be ≥ ${min}.` });
  if (max !== undefined) s = s.max(max, { message: `Must be ≤ ${max}.` });
  return s;
};

const positive = (max?: number) => {
  let s = finiteNumber().gt(0, { message: "Must be greater than 0." });
  if (max !== undefined) s = s.max(max, { message: `Must be ≤ ${max}.` });
  return s;
};

const wholeNumber = (min: number, max?: number) => {
  let s = z.coerce.number().int({ message: "Must be a whole number." }).min(min, { message: `Must be ≥ ${min}.` });
  if (max !== undefined) s = s.max(max, { message: `Must be ≤ ${max}.` });
  return s;
};

const fraction = () =>
  finiteNumber().gt(0, { message: "Must be greater than 0." }).max(1, { message: "Must be ≤ 1." });

// Sign and duplicate checks run in the schedule refinement below.
export const onboardingEntrySchema = z.object({
  monthIndex: z.coerce
    .number()
    .int({ message: "Must be a whole number." })
    .max(MAX_PROJECTION_MONTHS, { message: `Must be ≤ ${MAX_PROJECTION_MONTHS}.` }),
  accountsAdded: z.coerce.number().int({ message: "Must be a whole number." }),
});

export const processStepSchema = z
  .object({
    name: z.string().min(1),
    minMinutes: num(0),
    maxMinutes: num(0),
    overrideMinutes: num(0).optional(),
  })
  .refine((step) => step.minMinutes <= step.maxMinutes, {
    path: ["maxMinutes"],
    message: "Maximum minutes must be ≥ minimum minutes.",
  });

export const assumptionSchema = z
  .object({
    totalAccounts: wholeNumber(1),
    onboardingSchedule: z
      .array(onboardingEntrySchema)
      .nonempty({ message: "Add at least one onboarding month." }),
    totalClaimsValue: num(0),
    avgClaimValue: positive(),
    claimsPeriodMonths: wholeNumber(1).default(12),
    processSteps: z.array(processStepSchema).nonempty({ message: "Add at least one process step." }),
    targetApprovalRate: fraction(),
    submissionSlaDays: wholeNumber(1),
    denialSlaDays: wholeNumber(1),
    revenuePercentage: fraction(),
    targetGrossMargin: fraction(),
    analystMonthlyCost: num(0),
    managerMonthlyCost: num(0),
    managerToAnalystRatio: wholeNumber(1),
    utilizationFactor: fraction(),
    hoursPerDay: positive(24),
    daysPerMonth: positive(31),
    steadyStateMonths: wholeNumber(0, MAX_PROJECTION_MONTHS).default(1),
  })
  .superRefine((value, ctx) => {
    const issues = findOnboardingIssues(value.onboardingSchedule, value.totalAccounts);

    issues.forEach((issue) => {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: issue.path.split("."),
        message: issue.message,
      });
    });

    const scheduledAccounts = value.onboardingSchedule.reduce((sum, entry) => sum + entry.accountsAdded, 0);

    if (scheduledAccounts < value.totalAccounts) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["onboardingSchedule"],
        message: `Schedule onboards ${scheduledAccounts} of ${value.totalAccounts} accounts; every account must be onboarded.`,
      });
    }
  });

export type AssumptionInput = z.input<typeof assumptionSchema>;

const freezeAssumptions = (value: AssumptionSet): AssumptionSet =>
  Object.freeze({
    ...value,
    onboardingSchedule: Object.freeze(
      [...value.onboardingSchedule]
        .sort((a, b) => a.monthIndex - b.monthIndex)
        .map((entry) => Object.freeze({ ...entry })),
    ),
    processSteps: Object.freeze(value.processSteps.map((step) => Object.freeze({ ...step }))),
  });

/**
 * Validates raw assumptions (form values, parsed JSON) and returns a frozen
 * assumption set. Throws `ConfigurationError` listing every violated rule.
 */
export const createAssumptionSet = (input: unknown): AssumptionSet => {
  const result = assumptionSchema.safeParse(input);

  if (!result.success) {
    throw ConfigurationError.fromZodError(result.error);
  }

  return freezeAssumptions(result.data);
};

const ANALYST_BASE_SALARY = 500;
const FULLY_LOADED_MULTIPLIER = 1.5;
const MANAGER_PREMIUM = 1.5;

const analystMonthlyCost = fullyLoadedCost(ANALYST_BASE_SALARY, FULLY_LOADED_MULTIPLIER);

export const DEFAULT_ASSUMPTIONS: AssumptionSet = createAssumptionSet({
  totalAccounts: 100,
  onboardingSchedule: [
    { monthIndex: 1, accountsAdded: 10 },
    { monthIndex: 2, accountsAdded: 30 },
    { monthIndex: 3, accountsAdded: 60 },
  ],
  totalClaimsValue: 200_000_000,
  avgClaimValue: 200,
  claimsPeriodMonths: 12,
  processSteps: [
    { name: "Extract Encounters", minMinutes: 2, maxMinutes: 5 },
    { name: "Submit Claims", minMinutes: 2, maxMinutes: 5 },
    { name: "Reconcile", minMinutes: 2, maxMinutes: 5 },
    { name: "Denial Analysis", minMinutes: 2, maxMinutes: 5 },
    { name: "Resubmission", minMinutes: 2, maxMinutes: 5 },
  ],
  targetApprovalRate: 0.9,
  submissionSlaDays: 5,
  denialSlaDays: 3,
  revenuePercentage: 0.05,
  targetGrossMargin: 0.6,
  analystMonthlyCost,
  managerMonthlyCost: analystMonthlyCost * MANAGER_PREMIUM,
  managerToAnalystRatio: 12,
  utilizationFactor: 0.85,
  hoursPerDay: 8,
  daysPerMonth: 22,
  steadyStateMonths: 1,
} satisfies AssumptionInput);
