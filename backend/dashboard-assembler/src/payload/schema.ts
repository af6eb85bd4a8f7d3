import { z } from "zod";

export const AUDITED_YEARS_EMPTY =
  "auditedYearsDetected is empty (must include at least one audited year).";

export const UNSAFE_INTEGER =
  "integer is too large to keep its exact value; send it as a string";

type JsonPath = (string | number)[];

function unsafeIntegerPaths(value: unknown, path: JsonPath = []): JsonPath[] {
  if (typeof value === "number") {
    return Number.isInteger(value) && !Number.isSafeInteger(value) ? [path] : [];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item, i) => unsafeIntegerPaths(item, [...path, i]));
  }
  if (typeof value === "object" && value !== null) {
    return Object.entries(value).flatMap(([key, item]) => unsafeIntegerPaths(item, [...path, key]));
  }
  return [];
}

const yearId = z.union([z.string(), z.number()]);

/**
 * Required keys are listed in the order issues are reported.
 * Extra keys pass through untouched. Integers beyond 2^53 have already
 * been rounded by JSON.parse, so they are rejected rather than injected.
 */
export const payloadSchema = z
  .object({
    auditedYearsDetected: z.array(yearId).min(1, { message: AUDITED_YEARS_EMPTY }),
    historicalData: z.record(z.unknown()),
    companyFacilities: z.array(z.unknown()),
    directorFacilities: z.array(z.unknown()),
    bankRules: z.record(z.unknown()).nullish(),
    bankRulesFull: z.record(z.unknown()).nullish(),
  })
  .passthrough()
  .superRefine((payload, ctx) => {
    for (const path of unsafeIntegerPaths(payload)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: UNSAFE_INTEGER });
    }
  });
