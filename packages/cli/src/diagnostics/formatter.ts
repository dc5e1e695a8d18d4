// pattern: Functional Core
// Text and JSON rendering of doctor reports

import { Chalk } from "chalk";

import type { CheckResult, DoctorReport } from "./types.js";

export interface FormatOptions {
  colorize: boolean;
}

export function formatCheck(result: CheckResult, options: FormatOptions): string {
  const chalk = new Chalk({ level: options.colorize ? 1 : 0 });
  const status = result.passed ? chalk.green("PASS") : chalk.red("FAIL");
  return result.value === undefined
    ? `* ${result.label}: ${status}`
    : `* ${result.label} (=${result.value}): ${status}`;
}

export function formatDoctorReport(
  report: DoctorReport,
  options: FormatOptions
): string {
  const lines: string[] = [];

  for (const section of report.sections) {
    lines.push("", `## ${section.title}:`);
    for (const result of section.checks) {
      lines.push(formatCheck(result, options));
    }
    lines.push(...section.notes);
  }

  lines.push(
    "",
    "## Summary:",
    `Passed ${report.passed} out of ${report.total} checks`
  );
  return lines.join("\n");
}

export function formatDoctorReportJson(report: DoctorReport): string {
  return JSON.stringify(report, null, 2);
}
