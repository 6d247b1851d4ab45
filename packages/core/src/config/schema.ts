import { z } from "zod";

export const StatisticNameSchema = z.enum([
  "count",
  "mean",
  "variance",
  "sample_variance",
  "standard_deviation",
  "sample_standard_deviation",
  "skewness",
  "kurtosis"
]);

export const ALL_STATISTICS = StatisticNameSchema.options;

export const ReportSchema = z.object({
  statistics: z
    .array(StatisticNameSchema)
    .min(1, "at least one statistic must be reported")
    .default([...ALL_STATISTICS]),
  precision: z.number().int().min(0).max(17).default(6),
  format: z.enum(["table", "json"]).default("table")
});

export const InputSchema = z.object({
  strict: z.boolean().default(false)
});

export const AggregationSchema = z.object({
  shards: z.number().int().min(1).max(1_024).default(1)
});

export const StreamstatConfigSchema = z
  .object({
    report: ReportSchema.default({}),
    input: InputSchema.default({}),
    aggregation: AggregationSchema.default({})
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.report.statistics.forEach((name, index) => {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Statistic "${name}" is listed more than once`,
          path: ["report", "statistics", index]
        });
      }
      seen.add(name);
    });
  });

export type StreamstatConfig = z.infer<typeof StreamstatConfigSchema>;
export type StatisticName = z.infer<typeof StatisticNameSchema>;
export type ReportConfig = z.infer<typeof ReportSchema>;
