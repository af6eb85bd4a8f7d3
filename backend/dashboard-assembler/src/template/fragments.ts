/**
 * Read the static template fragments and the default rules document.
 */

import { existsSync, readFileSync } from "node:fs";
import type { AssemblerConfig } from "../config.js";
import { AssemblyError } from "../errors.js";
import { isRecord } from "../rules/derive.js";
import type { JsonObject } from "../types.js";

export type TemplateFragments = {
  shell: string;
  engine: string;
};

function loadText(path: string): string {
  if (!existsSync(path)) {
    throw new AssemblyError(`Missing: ${path}`);
  }
  return readFileSync(path, "utf-8");
}

export function loadTemplateFragments(
  config: Pick<AssemblerConfig, "shellPath" | "enginePath">
): TemplateFragments {
  return {
    shell: loadText(config.shellPath),
    engine: loadText(config.enginePath),
  };
}

/** undefined when no default rules file is stored at `path` */
export function loadDefaultBankRulesFull(path: string): JsonObject | undefined {
  if (!existsSync(path)) return undefined;

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new AssemblyError(`Default bank rules are not valid JSON (${path}): ${msg}`);
  }
  if (!isRecord(data)) {
    throw new AssemblyError(`Default bank rules must be a JSON object: ${path}`);
  }
  return data;
}

export function templateStatus(config: AssemblerConfig): {
  shell: boolean;
  engine: boolean;
  defaultRules: boolean;
} {
  return {
    shell: existsSync(config.shellPath),
    engine: existsSync(config.enginePath),
    defaultRules: existsSync(config.bankRulesFullPath),
  };
}
