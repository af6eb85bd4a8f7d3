/**
 * Build the block of const declarations spliced in at the injection marker.
 * Identifier names are fixed: the engine fragment reads them as globals.
 */

import type { JsonObject } from "../types.js";

export const INJECTED_CONSTANTS = [
  "auditedYearsDetected",
  "historicalData",
  "bankRules",
  "companyFacilities",
  "directorFacilities",
] as const;

export type InjectedConstant = (typeof INJECTED_CONSTANTS)[number];

export type InjectionData = Record<InjectedConstant, unknown> & {
  bankRulesFull?: JsonObject;
};

const INDENT = "        ";
const RULE = `${INDENT}// =============================================`;

/** Compact JSON that cannot terminate the surrounding <script> element */
export function toInlineJson(value: unknown): string {
  return JSON.stringify(value ?? null).replace(/<\//g, "<\\/");
}

function declaration(name: string, value: unknown): string {
  return `${INDENT}const ${name} = ${toInlineJson(value)};`;
}

export function buildInjectionBlock(data: InjectionData): string {
  const lines = [
    "",
    RULE,
    `${INDENT}// [INJECTED BY DASHBOARD ASSEMBLER]`,
    RULE,
    ...INJECTED_CONSTANTS.map((name) => declaration(name, data[name])),
  ];
  if (data.bankRulesFull !== undefined) {
    lines.push(declaration("bankRulesFull", data.bankRulesFull));
  }
  lines.push("");
  return lines.join("\n");
}
