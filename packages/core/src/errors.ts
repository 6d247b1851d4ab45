export type InsufficientDataReason = "too_few_observations" | "zero_variance";

export class InsufficientDataError extends Error {
  readonly statistic: string;
  readonly count: number;
  readonly required: number;
  readonly reason: InsufficientDataReason;

  constructor(statistic: string, count: number, required: number, reason: InsufficientDataReason) {
    super(
      reason === "zero_variance"
        ? `${statistic} is undefined for zero-variance data`
        : `${statistic} needs at least ${required} observation${required === 1 ? "" : "s"}, got ${count}`
    );
    this.name = "InsufficientDataError";
    this.statistic = statistic;
    this.count = count;
    this.required = required;
    this.reason = reason;
  }
}

export class InvalidStateError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid moment state:\n${issues.map((issue) => `  ${issue}`).join("\n")}`);
    this.name = "InvalidStateError";
    this.issues = issues;
  }
}

export interface ParseIssue {
  line: number;
  token: string;
}

export class ParseError extends Error {
  readonly issue: ParseIssue;

  constructor(issue: ParseIssue) {
    super(`Line ${issue.line}: not a number: "${issue.token}"`);
    this.name = "ParseError";
    this.issue = issue;
  }
}
