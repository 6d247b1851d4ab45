import { StreamstatConfigSchema, type StreamstatConfig } from "@streamstat/core";

export interface CliOverrides {
  shards?: string;
  precision?: string;
  strict?: boolean;
  json?: boolean;
}

/** Layers command line flags over the file config and re-validates the result. */
export function applyOverrides(config: StreamstatConfig, overrides: CliOverrides): StreamstatConfig {
  const result = StreamstatConfigSchema.safeParse({
    report: {
      ...config.report,
      ...(overrides.precision !== undefined ? { precision: Number(overrides.precision) } : {}),
      ...(overrides.json ? { format: "json" } : {})
    },
    input: {
      ...config.input,
      ...(overrides.strict ? { strict: true } : {})
    },
    aggregation: {
      ...config.aggregation,
      ...(overrides.shards !== undefined ? { shards: Number(overrides.shards) } : {})
    }
  });
  if (!result.success) {
    const messages = result.error.issues.map((issue) => `  --${String(issue.path[issue.path.length - 1])}: ${issue.message}`);
    throw new Error(`Invalid options:\n${messages.join("\n")}`);
  }
  return result.data;
}
