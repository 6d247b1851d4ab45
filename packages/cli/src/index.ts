#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { defineCommand, runMain } from "citty";
import chalk from "chalk";
import ora from "ora";
import { loadConfig, loadConfigIfExists, parseKeyedValues, parseValues, type ParseIssue } from "@streamstat/core";
import { aggregateKeyed, aggregateValues, mergeStates, serializeState } from "./aggregate.js";
import { inputSpinner, readInputs } from "./input.js";
import { setVerbose, warn } from "./log.js";
import { applyOverrides } from "./options.js";
import { printReport } from "./output.js";

const DEFAULT_CONFIG = "./streamstat.config.yaml";

function reportIssues(issues: ParseIssue[]): void {
  for (const issue of issues) {
    warn(`line ${issue.line}: skipping "${issue.token}"`);
  }
}

function fail(error: unknown): never {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
}

const summarizeCommand = defineCommand({
  meta: {
    name: "summarize",
    description: "Compute running moments of numeric input"
  },
  args: {
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" },
    keyed: { type: "boolean", default: false, alias: "k" },
    shards: { type: "string" },
    precision: { type: "string", alias: "p" },
    strict: { type: "boolean", default: false },
    json: { type: "boolean", default: false },
    verbose: { type: "boolean", default: false, alias: "v" }
  },
  run: async ({ args }) => {
    setVerbose(Boolean(args.verbose));
    try {
      const config = applyOverrides(await loadConfigIfExists(String(args.config)), {
        ...(args.shards !== undefined ? { shards: String(args.shards) } : {}),
        ...(args.precision !== undefined ? { precision: String(args.precision) } : {}),
        strict: Boolean(args.strict),
        json: Boolean(args.json)
      });

      const spinner = inputSpinner(args._);
      let text: string;
      try {
        text = await readInputs(args._);
      } catch (error) {
        spinner?.fail("Could not read input");
        throw error;
      }
      spinner?.stop();

      const parseOptions = { strict: config.input.strict };
      const shards = config.aggregation.shards;

      if (args.keyed) {
        const { entries, issues } = parseKeyedValues(text, parseOptions);
        reportIssues(issues);
        const keyed = aggregateKeyed(entries, shards);
        const rows = Object.entries(keyed.summaries()).map(([label, summary]) => ({ label, summary }));
        printReport(rows, config.report);
        return;
      }

      const { values, issues } = parseValues(text, parseOptions);
      reportIssues(issues);
      printReport([{ label: "", summary: aggregateValues(values, shards).summary() }], config.report);
    } catch (error) {
      fail(error);
    }
  }
});

const stateCommand = defineCommand({
  meta: {
    name: "state",
    description: "Print the accumulator state of the input as JSON"
  },
  args: {
    strict: { type: "boolean", default: false }
  },
  run: async ({ args }) => {
    try {
      const text = await readInputs(args._);
      const { values, issues } = parseValues(text, { strict: Boolean(args.strict) });
      reportIssues(issues);
      console.log(serializeState(aggregateValues(values, 1)));
    } catch (error) {
      fail(error);
    }
  }
});

const mergeCommand = defineCommand({
  meta: {
    name: "merge",
    description: "Merge accumulator state files"
  },
  args: {
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" },
    state: { type: "boolean", default: false },
    precision: { type: "string", alias: "p" },
    json: { type: "boolean", default: false }
  },
  run: async ({ args }) => {
    try {
      if (args._.length === 0) {
        throw new Error("merge needs at least one state file");
      }
      const sources = await Promise.all(
        args._.map(async (name) => ({ name, json: await readFile(name, "utf8") }))
      );
      const merged = mergeStates(sources);

      if (args.state) {
        console.log(serializeState(merged));
        return;
      }

      const config = applyOverrides(await loadConfigIfExists(String(args.config)), {
        ...(args.precision !== undefined ? { precision: String(args.precision) } : {}),
        json: Boolean(args.json)
      });
      printReport([{ label: "", summary: merged.summary() }], config.report);
    } catch (error) {
      fail(error);
    }
  }
});

const validateCommand = defineCommand({
  meta: { name: "validate", description: "Validate config file" },
  args: {
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" }
  },
  run: async ({ args }) => {
    const spinner = ora("Validating config").start();
    try {
      const cfg = await loadConfig(String(args.config));
      spinner.succeed("Config valid");
      console.log(`Statistics: ${cfg.report.statistics.join(", ")}`);
      console.log(`Format: ${cfg.report.format} (precision ${cfg.report.precision})`);
      console.log(`Shards: ${cfg.aggregation.shards}`);
    } catch (error) {
      spinner.fail(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  }
});

const main = defineCommand({
  meta: {
    name: "streamstat",
    description: "Single-pass mean, variance, skewness and kurtosis"
  },
  subCommands: {
    summarize: summarizeCommand,
    state: stateCommand,
    merge: mergeCommand,
    validate: validateCommand
  }
});

void runMain(main);
