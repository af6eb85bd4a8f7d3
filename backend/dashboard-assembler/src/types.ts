/**
 * Dashboard assembler types.
 * Payload shape comes from the zod schema; rules documents are plain JSON.
 */

import type { z } from "zod";
import type { payloadSchema } from "./payload/schema.js";

export type DashboardPayload = z.infer<typeof payloadSchema>;

/** One lending model inside a bank's authoritative rules */
export type ModelRuleFull = {
  enabled?: boolean;
  min_dscr?: number | null;
  formula_text?: string;
};

export type BankEntryFull = {
  models?: {
    financial?: ModelRuleFull;
    non_financial?: ModelRuleFull;
  };
  eligibility_notes?: string;
};

/** Authoritative rules document (rules/bankRules.json or payload.bankRulesFull) */
export type BankRulesFull = {
  banks?: Record<string, BankEntryFull>;
  [key: string]: unknown;
};

export type BankRule = {
  allowFinancial: boolean;
  allowNonFinancial: boolean;
  minFinancial: number | null;
  minNonFinancial: number | null;
  adjustment?: "excludeOtherIncome";
  turnoverMultiplier?: number;
};

/** Flattened per-bank summary read by the dashboard engine as `bankRules` */
export type BankRules = Record<string, BankRule>;

export type JsonObject = Record<string, unknown>;

export type BankRulesResolution =
  | { kind: "supplied"; bankRules: JsonObject }
  | {
      kind: "derived";
      source: "payload" | "default-file";
      bankRules: BankRules;
      bankRulesFull: JsonObject;
    }
  | { kind: "fallback-missing"; bankRules: BankRules };

export type ShellParts = {
  prefix: string;
  suffix: string;
};

export type AssembledDashboard = {
  html: string;
  resolution: BankRulesResolution;
};

export type PayloadSource = "paste" | "upload";
