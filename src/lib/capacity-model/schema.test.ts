import { describe, expect, it } from "vitest";

import { ConfigurationError } from "./errors";
import { DEFAULT_ASSUMPTIONS, MAX_PROJECTION_MONTHS, createAssumptionSet } from "./schema";

const captureIssues = (input: unknown) => {
  try {
    createAssumptionSet(input);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }

  throw new Error("expected the assumptions to be rejected");
};

describe("DEFAULT_ASSUMPTIONS", () => {
  it("matches the case-study scenario", () => {
    expect(DEFAULT_ASSUMPTIONS.totalAccounts).toBe(100);
    expect(DEFAULT_ASSUMPTIONS.onboardingSchedule.map((entry) => entry.accountsAdded)).toEqual([10, 30, 60]);
    expect(DEFAULT_ASSUMPTIONS.processSteps).toHaveLength(5);
    expect(DEFAULT_ASSUMPTIONS.analystMonthlyCost).toBe(750);
    expect(DEFAULT_ASSUMPTIONS.managerMonthlyCost).toBe(1125);
    expect(DEFAULT_ASSUMPTIONS.managerToAnalystRatio).toBe(12);
  });

  it("is frozen down to the schedule entries", () => {
    expect(Object.isFrozen(DEFAULT_ASSUMPTIONS)).toBe(true);
    expect(Object.isFrozen(DEFAULT_ASSUMPTIONS.onboardingSchedule)).toBe(true);
    expect(Object.isFrozen(DEFAULT_ASSUMPTIONS.processSteps[0])).toBe(true);
  });
});

describe("createAssumptionSet", () => {
  it("coerces string values and fills defaults", () => {
    const { claimsPeriodMonths, steadyStateMonths, ...rest } = DEFAULT_ASSUMPTIONS;
    const assumptions = createAssumptionSet({ ...rest, targetApprovalRate: "0.8" });

    expect(assumptions.targetApprovalRate).toBe(0.8);
    expect(assumptions.claimsPeriodMonths).toBe(claimsPeriodMonths);
    expect(assumptions.steadyStateMonths).toBe(steadyStateMonths);
  });

  it("sorts the onboarding schedule by month", () => {
    const assumptions = createAssumptionSet({
      ...DEFAULT_ASSUMPTIONS,
      onboardingSchedule: [
        { monthIndex: 3, accountsAdded: 60 },
        { monthIndex: 1, accountsAdded: 10 },
        { monthIndex: 2, accountsAdded: 30 },
      ],
    });

    expect(assumptions.onboardingSchedule.map((entry) => entry.monthIndex)).toEqual([1, 2, 3]);
  });

  it("rejects an oversubscribed onboarding schedule", () => {
    const issues = captureIssues({
      ...DEFAULT_ASSUMPTIONS,
      onboardingSchedule: [
        { monthIndex: 1, accountsAdded: 50 },
        { monthIndex: 2, accountsAdded: 60 },
      ],
    });

    expect(issues).toEqual([
      { path: "onboardingSchedule", message: "Schedule onboards 110 accounts but only 100 exist." },
    ]);
  });

  it("rejects a schedule that leaves accounts un-onboarded", () => {
    const issues = captureIssues({
      ...DEFAULT_ASSUMPTIONS,
      onboardingSchedule: [{ monthIndex: 1, accountsAdded: 90 }],
    });

    expect(issues).toEqual([
      {
        path: "onboardingSchedule",
        message: "Schedule onboards 90 of 100 accounts; every account must be onboarded.",
      },
    ]);
  });

  it("rejects negative and duplicate schedule entries", () => {
    const issues = captureIssues({
      ...DEFAULT_ASSUMPTIONS,
      onboardingSchedule: [
        { monthIndex: 1, accountsAdded: -5 },
        { monthIndex: 1, accountsAdded: 105 },
      ],
    });

    expect(issues).toEqual([
      { path: "onboardingSchedule.0.accountsAdded", message: "Accounts added cannot be negative." },
      { path: "onboardingSchedule.1.monthIndex", message: "Month 1 is scheduled more than once." },
    ]);
  });

  it("rejects fractions outside (0, 1]", () => {
    const issues = captureIssues({
      ...DEFAULT_ASSUMPTIONS,
      targetApprovalRate: 1.2,
      utilizationFactor: 0,
    });

    expect(issues).toEqual([
      { path: "targetApprovalRate", message: "Must be ≤ 1." },
      { path: "utilizationFactor", message: "Must be greater than 0." },
    ]);
  });

  it("rejects non-finite amounts and step timings", () => {
    expect(
      captureIssues({
        ...DEFAULT_ASSUMPTIONS,
        processSteps: [{ name: "Submit Claims", minMinutes: 2, maxMinutes: Infinity }],
      }),
    ).toEqual([{ path: "processSteps.0.maxMinutes", message: "Must be a finite number." }]);
    expect(captureIssues({ ...DEFAULT_ASSUMPTIONS, totalClaimsValue: Infinity })).toEqual([
      { path: "totalClaimsValue", message: "Must be a finite number." },
    ]);
  });

  it("bounds the projection horizon", () => {
    expect(
      captureIssues({
        ...DEFAULT_ASSUMPTIONS,
        onboardingSchedule: [
          { monthIndex: 1, accountsAdded: 10 },
          { monthIndex: 2_000_000, accountsAdded: 90 },
        ],
      }),
    ).toEqual([{ path: "onboardingSchedule.1.monthIndex", message: `Must be ≤ ${MAX_PROJECTION_MONTHS}.` }]);
    expect(captureIssues({ ...DEFAULT_ASSUMPTIONS, steadyStateMonths: 25 })).toEqual([
      { path: "steadyStateMonths", message: "Must be ≤ 24." },
    ]);
  });

  it("rejects a step whose maximum is below its minimum", () => {
    const issues = captureIssues({
      ...DEFAULT_ASSUMPTIONS,
      processSteps: [{ name: "Submit Claims", minMinutes: 5, maxMinutes: 2 }],
    });

    expect(issues).toEqual([
      { path: "processSteps.0.maxMinutes", message: "Maximum minutes must be ≥ minimum minutes." },
    ]);
  });

  it("summarises every issue in the error message", () => {
    expect(() => createAssumptionSet({ ...DEFAULT_ASSUMPTIONS, managerToAnalystRatio: 0, denialSlaDays: 0 })).toThrow(
      "denialSlaDays: Must be ≥ 1.; managerToAnalystRatio: Must be ≥ 1.",
    );
  });
});
