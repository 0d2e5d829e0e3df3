import { ConfigurationError } from "@/lib/capacity-model/errors";
import { generateReport } from "@/lib/capacity-model/report";
import { DEFAULT_ASSUMPTIONS, createAssumptionSet } from "@/lib/capacity-model/schema";
import { loadOverrides } from "@/lib/overrides";
import { buildReportRows, buildSummaryLines, type TableOptions } from "@/lib/report-table";

const TABLE_OPTIONS: TableOptions = {
  locale: "en-US",
  currency: "USD",
};

const main = (args: string[]): number => {
  try {
    const assumptions = createAssumptionSet({ ...DEFAULT_ASSUMPTIONS, ...loadOverrides(args[0]) });
    const report = generateReport(assumptions);

    console.log("RCM capacity projection\n");
    console.table(buildReportRows(report, TABLE_OPTIONS));
    buildSummaryLines(report, TABLE_OPTIONS).forEach((line) => console.log(line));
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error("Invalid assumptions:");
      error.issues.forEach((issue) => console.error(`  ${issue.path || "(root)"}: ${issue.message}`));
      return 1;
    }

    throw error;
  }
};

process.exitCode = main(process.argv.slice(2));
