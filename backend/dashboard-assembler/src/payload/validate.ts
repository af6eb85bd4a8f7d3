/**
 * Payload validation. Issues are collected, never thrown one at a time.
 */

import { ZodIssueCode, type ZodIssue } from "zod";
import { PayloadValidationError } from "../errors.js";
import type { DashboardPayload } from "../types.js";
import { payloadSchema } from "./schema.js";

export type ValidationResult =
  | { ok: true; payload: DashboardPayload }
  | { ok: false; issues: string[] };

function describeIssue(issue: ZodIssue): string {
  if (issue.path.length === 0) {
    return "Payload must be a JSON object";
  }
  if (
    issue.code === ZodIssueCode.invalid_type &&
    issue.received === "undefined" &&
    issue.path.length === 1
  ) {
    return `Missing required key: ${issue.path[0]}`;
  }
  if (issue.code === ZodIssueCode.too_small) {
    return issue.message;
  }
  return `Invalid ${issue.path.join(".")}: ${issue.message}`;
}

export function validatePayload(value: unknown): ValidationResult {
  const parsed = payloadSchema.safeParse(value);
  if (parsed.success) {
    return { ok: true, payload: parsed.data };
  }
  return { ok: false, issues: parsed.error.issues.map(describeIssue) };
}

export function requireValidPayload(value: unknown): DashboardPayload {
  const result = validatePayload(value);
  if (!result.ok) throw new PayloadValidationError(result.issues);
  return result.payload;
}
