/**
 * Runtime configuration from env. Template locations default to the
 * package's assets/ and rules/ directories.
 */

import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Package root for a module directory: the nearest ancestor with a
 * package.json. From a build under dist/ that ancestor is the workspace
 * root, so the package is found again under backend/.
 */
export function resolvePackageDir(moduleDir: string): string {
  let dir = moduleDir;
  while (!existsSync(join(dir, "package.json"))) {
    const parent = dirname(dir);
    if (parent === dir) return join(moduleDir, "..");
    dir = parent;
  }
  const workspacePackage = join(dir, "backend", "dashboard-assembler");
  return existsSync(join(workspacePackage, "package.json")) ? workspacePackage : dir;
}

const PACKAGE_DIR = resolvePackageDir(__dirname);

export const INJECTION_MARKER = "// [PART A: DATA INJECTION]";

export type AssemblerConfig = {
  shellPath: string;
  enginePath: string;
  bankRulesFullPath: string;
  marker: string;
  includeBankRulesFull: boolean;
  dashboardFileName: string;
  payloadFileName: string;
};

export type ServerConfig = {
  port: number;
  host: string;
  corsOrigin: string | boolean;
  bodyLimitBytes: number;
};

export const DEFAULT_ASSEMBLER_CONFIG: AssemblerConfig = {
  shellPath: join(PACKAGE_DIR, "assets", "dashboard_shell.html"),
  enginePath: join(PACKAGE_DIR, "assets", "dashboard_engine.txt"),
  bankRulesFullPath: join(PACKAGE_DIR, "rules", "bankRules.json"),
  marker: INJECTION_MARKER,
  includeBankRulesFull: false,
  dashboardFileName: "dscr_dashboard.html",
  payloadFileName: "dscr_payload.json",
};

type Env = Record<string, string | undefined>;

function flag(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

function intOr(value: string | undefined, fallback: number): number {
  const n = parseInt(value ?? "", 10);
  return Number.isNaN(n) ? fallback : n;
}

export function loadAssemblerConfig(env: Env = process.env): AssemblerConfig {
  return {
    ...DEFAULT_ASSEMBLER_CONFIG,
    shellPath: env.DASHBOARD_SHELL_PATH || DEFAULT_ASSEMBLER_CONFIG.shellPath,
    enginePath: env.DASHBOARD_ENGINE_PATH || DEFAULT_ASSEMBLER_CONFIG.enginePath,
    bankRulesFullPath: env.BANK_RULES_PATH || DEFAULT_ASSEMBLER_CONFIG.bankRulesFullPath,
    marker: env.INJECTION_MARKER || INJECTION_MARKER,
    includeBankRulesFull: flag(env.INCLUDE_BANK_RULES_FULL),
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: intOr(env.PORT, 3002),
    host: env.HOST ?? "0.0.0.0",
    corsOrigin: env.CORS_ORIGIN ?? true,
    bodyLimitBytes: intOr(env.BODY_LIMIT_BYTES, 5 * 1024 * 1024),
  };
}
