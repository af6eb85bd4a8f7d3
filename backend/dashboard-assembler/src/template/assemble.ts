/**
 * Dashboard assembly: shell prefix + injected constants + shell suffix + engine.
 * The engine fragment carries the closing tags; nothing is appended here.
 */

import type { AssemblerConfig } from "../config.js";
import { resolveBankRules, resolvedBankRulesFull, type DefaultRulesLoader } from "../rules/resolve.js";
import type { AssembledDashboard, DashboardPayload, ShellParts } from "../types.js";
import { loadDefaultBankRulesFull, loadTemplateFragments } from "./fragments.js";
import { buildInjectionBlock } from "./injection.js";
import { splitShell } from "./shell.js";

export type AssembleOptions = {
  loadDefaultRules: DefaultRulesLoader;
  includeBankRulesFull?: boolean;
};

export function assembleHtml(
  payload: DashboardPayload,
  shell: ShellParts,
  engine: string,
  options: AssembleOptions
): AssembledDashboard {
  const resolution = resolveBankRules(payload, options.loadDefaultRules);

  const injection = buildInjectionBlock({
    auditedYearsDetected: payload.auditedYearsDetected,
    historicalData: payload.historicalData,
    bankRules: resolution.bankRules,
    companyFacilities: payload.companyFacilities,
    directorFacilities: payload.directorFacilities,
    bankRulesFull: options.includeBankRulesFull
      ? resolvedBankRulesFull(payload, resolution)
      : undefined,
  });

  return {
    html: [shell.prefix, injection, shell.suffix, engine].join(""),
    resolution,
  };
}

/** Assemble against the template files named in `config` */
export function buildDashboard(
  payload: DashboardPayload,
  config: AssemblerConfig
): AssembledDashboard {
  const { shell, engine } = loadTemplateFragments(config);
  return assembleHtml(payload, splitShell(shell, config.marker), engine, {
    loadDefaultRules: () => loadDefaultBankRulesFull(config.bankRulesFullPath),
    includeBankRulesFull: config.includeBankRulesFull,
  });
}
