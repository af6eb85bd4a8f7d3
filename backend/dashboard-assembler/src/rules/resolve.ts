/**
 * Pick the bankRules injected into the dashboard.
 * Precedence: payload.bankRules, then payload.bankRulesFull, then the
 * default rules document. With none of them the result is an empty lookup.
 */

import type { BankRulesResolution, DashboardPayload, JsonObject } from "../types.js";
import { deriveBankRules } from "./derive.js";

/** Returns the default rules document, or undefined when none is stored */
export type DefaultRulesLoader = () => JsonObject | undefined;

export function resolveBankRules(
  payload: Pick<DashboardPayload, "bankRules" | "bankRulesFull">,
  loadDefaultRules: DefaultRulesLoader
): BankRulesResolution {
  if (payload.bankRules != null) {
    return { kind: "supplied", bankRules: payload.bankRules };
  }

  if (payload.bankRulesFull != null) {
    return {
      kind: "derived",
      source: "payload",
      bankRules: deriveBankRules(payload.bankRulesFull),
      bankRulesFull: payload.bankRulesFull,
    };
  }

  const fallback = loadDefaultRules();
  if (fallback === undefined) {
    return { kind: "fallback-missing", bankRules: {} };
  }

  return {
    kind: "derived",
    source: "default-file",
    bankRules: deriveBankRules(fallback),
    bankRulesFull: fallback,
  };
}

/** bankRulesFull to inject next to bankRules, when one is known */
export function resolvedBankRulesFull(
  payload: Pick<DashboardPayload, "bankRulesFull">,
  resolution: BankRulesResolution
): JsonObject | undefined {
  if (resolution.kind === "derived") return resolution.bankRulesFull;
  return payload.bankRulesFull ?? undefined;
}
