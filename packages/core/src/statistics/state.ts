import { z } from "zod";
import { InvalidStateError } from "../errors.js";
import type { MomentState } from "./moments.js";

export const MomentStateSchema = z
  .object({
    count: z.number().int().min(0),
    m1: z.number().finite(),
    m2: z.number().finite().min(0, "m2 is a sum of squares and cannot be negative"),
    m3: z.number().finite(),
    m4: z.number().finite()
  })
  .strict()
  .superRefine((state, ctx) => {
    if (state.count === 0 && (state.m1 !== 0 || state.m2 !== 0 || state.m3 !== 0 || state.m4 !== 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "An empty state must have all moments equal to 0",
        path: ["count"]
      });
    }
    if (state.count === 1 && (state.m2 !== 0 || state.m3 !== 0 || state.m4 !== 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "A single observation has no dispersion: m2, m3 and m4 must be 0",
        path: ["count"]
      });
    }
  });

export function parseMomentState(input: unknown): MomentState {
  const result = MomentStateSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidStateError(
      result.error.issues.map((issue) => {
        const pointer = issue.path.length > 0 ? issue.path.join(".") : "root";
        return `${pointer}: ${issue.message}`;
      })
    );
  }
  return result.data;
}
