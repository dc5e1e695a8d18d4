// pattern: Functional Core
// Types for doctor report data structures

export interface CheckResult {
  label: string;
  passed: boolean;
  /** Observed value, shown next to the label */
  value?: string;
}

export interface CheckSection {
  title: string;
  checks: CheckResult[];
  /** Free-form lines printed after the checks */
  notes: string[];
  /** Whether the section's checks count towards the summary and exit status */
  counted: boolean;
}

export interface DoctorReport {
  timestamp: string;
  sections: CheckSection[];
  passed: number;
  total: number;
}

export function check(
  label: string,
  passed: boolean,
  value?: string
): CheckResult {
  return value === undefined ? { label, passed } : { label, passed, value };
}
