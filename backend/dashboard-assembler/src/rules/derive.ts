/**
 * Flatten bankRulesFull (authoritative) into the engine's bankRules lookup.
 * Bank names come from the document's keys; optional fields come from the
 * rule text, never from bank names.
 */

import type { BankRule, BankRules } from "../types.js";

const EXCLUDE_OTHER_INCOME = "excludeOtherIncome";
const TURNOVER_UPLIFT = 1.2;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function recordOrEmpty(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

// Empty lists and objects count as disabled, like empty strings and zero
function isEnabled(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

function minDscr(model: Record<string, unknown>): number | null {
  return typeof model.min_dscr === "number" ? model.min_dscr : null;
}

export function deriveBankRule(bank: unknown): BankRule {
  const bankObj = recordOrEmpty(bank);
  const models = recordOrEmpty(bankObj.models);
  const fin = recordOrEmpty(models.financial);
  const non = recordOrEmpty(models.non_financial);
  const notes = text(bankObj.eligibility_notes);

  const entry: BankRule = {
    allowFinancial: isEnabled(fin.enabled),
    allowNonFinancial: isEnabled(non.enabled),
    minFinancial: minDscr(fin),
    minNonFinancial: minDscr(non),
  };

  const finText = (text(fin.formula_text) + "\n" + notes).toLowerCase();
  if (finText.includes("exclude") && finText.includes("other income")) {
    entry.adjustment = EXCLUDE_OTHER_INCOME;
  }

  const nonText = (text(non.formula_text) + "\n" + notes).toLowerCase();
  if (nonText.includes("20%") || nonText.includes("20 %")) {
    entry.turnoverMultiplier = TURNOVER_UPLIFT;
  }

  return entry;
}

export function deriveBankRules(bankRulesFull: unknown): BankRules {
  const banks = recordOrEmpty(recordOrEmpty(bankRulesFull).banks);
  // fromEntries keeps keys such as "__proto__" as own properties
  return Object.fromEntries(
    Object.entries(banks).map(([bankName, bank]) => [bankName, deriveBankRule(bank)])
  );
}
