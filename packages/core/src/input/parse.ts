import { ParseError, type ParseIssue } from "../errors.js";

export interface ParseOptions {
  strict?: boolean;
}

export interface ParsedValues {
  values: number[];
  issues: ParseIssue[];
}

export interface KeyedValue {
  key: string;
  value: number;
}

export interface ParsedKeyedValues {
  entries: KeyedValue[];
  issues: ParseIssue[];
}

const TOKEN_SEPARATOR = /[\s,]+/;

const LITERALS: Record<string, number> = {
  nan: Number.NaN,
  inf: Number.POSITIVE_INFINITY,
  "+inf": Number.POSITIVE_INFINITY,
  "-inf": Number.NEGATIVE_INFINITY,
  infinity: Number.POSITIVE_INFINITY,
  "+infinity": Number.POSITIVE_INFINITY,
  "-infinity": Number.NEGATIVE_INFINITY
};

export function parseNumber(token: string): number | null {
  const literal = LITERALS[token.toLowerCase()];
  if (literal !== undefined) {
    return literal;
  }
  const value = Number(token);
  return Number.isNaN(value) ? null : value;
}

export function parseValues(text: string, options: ParseOptions = {}): ParsedValues {
  const values: number[] = [];
  const issues: ParseIssue[] = [];

  for (const [line, content] of dataLines(text)) {
    for (const token of content.split(TOKEN_SEPARATOR)) {
      if (token === "") continue;
      const value = parseNumber(token);
      if (value === null) {
        report(issues, { line, token }, options);
      } else {
        values.push(value);
      }
    }
  }

  return { values, issues };
}

export function parseKeyedValues(text: string, options: ParseOptions = {}): ParsedKeyedValues {
  const entries: KeyedValue[] = [];
  const issues: ParseIssue[] = [];

  for (const [line, content] of dataLines(text)) {
    const tokens = content.split(TOKEN_SEPARATOR).filter((token) => token !== "");
    const value = tokens.length === 2 ? parseNumber(tokens[1]!) : null;
    if (tokens.length !== 2 || value === null) {
      report(issues, { line, token: content }, options);
      continue;
    }
    entries.push({ key: tokens[0]!, value });
  }

  return { entries, issues };
}

/** Yields [1-based line number, trimmed content] for non-blank, non-comment lines. */
function* dataLines(text: string): Generator<[number, string]> {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const content = lines[i]!.trim();
    if (content === "" || content.startsWith("#")) continue;
    yield [i + 1, content];
  }
}

function report(issues: ParseIssue[], issue: ParseIssue, options: ParseOptions): void {
  if (options.strict) {
    throw new ParseError(issue);
  }
  issues.push(issue);
}
