/**
 * Dashboard assembler commands. `cli.ts` is the executable entry; tests
 * drive `runCli` with their own output and stdin.
 */

import { Command, CommanderError } from "commander";
import { readFileSync, writeFileSync } from "node:fs";
import { loadAssemblerConfig, type AssemblerConfig } from "./config.js";
import { parsePayloadText } from "./payload/parse.js";
import { requireValidPayload } from "./payload/validate.js";
import { deriveBankRules } from "./rules/derive.js";
import { buildDashboard } from "./template/assemble.js";
import { extractTemplate } from "./template/extract.js";

export type CliIO = {
  log: (line: string) => void;
  error: (line: string) => void;
  readStdin: () => string;
  env: Record<string, string | undefined>;
};

const processIO: CliIO = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
  readStdin: () => readFileSync(0, "utf-8"),
  env: process.env,
};

type AssembleOpts = {
  payload: string;
  out: string;
  payloadOut?: string;
  shell?: string;
  engine?: string;
  rules?: string;
  marker?: string;
  includeFull?: boolean;
};

type DeriveOpts = {
  rules: string;
  out?: string;
};

type ExtractOpts = {
  source: string;
  shellOut: string;
  engineOut: string;
  marker?: string;
};

function withOverrides(base: AssemblerConfig, opts: AssembleOpts): AssemblerConfig {
  return {
    ...base,
    shellPath: opts.shell ?? base.shellPath,
    enginePath: opts.engine ?? base.enginePath,
    bankRulesFullPath: opts.rules ?? base.bankRulesFullPath,
    marker: opts.marker ?? base.marker,
    includeBankRulesFull: opts.includeFull ?? base.includeBankRulesFull,
  };
}

export function buildProgram(io: CliIO = processIO): Command {
  const readInput = (path: string): string =>
    path === "-" ? io.readStdin() : readFileSync(path, "utf-8");

  const program = new Command();

  // Set before adding commands so subcommands inherit them
  program
    .name("dscr-assembler")
    .description("Assemble the DSCR dashboard from a JSON payload")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.log(str.trimEnd()),
      writeErr: (str) => io.error(str.trimEnd()),
    });

  program
    .command("assemble")
    .description("Inject a payload into the dashboard template")
    .requiredOption("-p, --payload <file>", "Payload JSON file (- for stdin); code fences are stripped")
    .option("-o, --out <file>", "Output HTML file", "dscr_dashboard.html")
    .option("--payload-out <file>", "Also write the accepted payload, pretty-printed")
    .option("--shell <file>", "Shell fragment containing the injection marker")
    .option("--engine <file>", "Engine fragment appended after the shell")
    .option("--rules <file>", "Default bankRulesFull document")
    .option("--marker <text>", "Injection marker in the shell")
    .option("--include-full", "Also inject bankRulesFull")
    .action((opts: AssembleOpts) => {
      const config = withOverrides(loadAssemblerConfig(io.env), opts);
      const source = opts.payload === "-" ? "paste" : "upload";
      const payload = requireValidPayload(parsePayloadText(readInput(opts.payload), source));

      const { html, resolution } = buildDashboard(payload, config);
      writeFileSync(opts.out, html, "utf-8");

      const banks = Object.keys(resolution.bankRules).length;
      io.log(`bankRules: ${resolution.kind} (${banks} bank${banks === 1 ? "" : "s"})`);
      io.log(`Dashboard written: ${opts.out}`);

      if (opts.payloadOut) {
        writeFileSync(opts.payloadOut, JSON.stringify(payload, null, 2), "utf-8");
        io.log(`Payload written: ${opts.payloadOut}`);
      }
    });

  program
    .command("derive")
    .description("Flatten a bankRulesFull document into bankRules")
    .requiredOption("-r, --rules <file>", "bankRulesFull JSON file")
    .option("-o, --out <file>", "Write to file instead of stdout")
    .action((opts: DeriveOpts) => {
      const full: unknown = JSON.parse(readInput(opts.rules));
      const out = JSON.stringify(deriveBankRules(full), null, 2);
      if (opts.out) {
        writeFileSync(opts.out, out, "utf-8");
        io.log(`bankRules written: ${opts.out}`);
      } else {
        io.log(out);
      }
    });

  program
    .command("extract")
    .description("Split a reference dashboard into shell and engine fragments")
    .requiredOption("-s, --source <file>", "Reference dashboard HTML")
    .option("--shell-out <file>", "Shell output", "dashboard_shell.html")
    .option("--engine-out <file>", "Engine output", "dashboard_engine.txt")
    .option("--marker <text>", "Injection marker written into the shell")
    .action((opts: ExtractOpts) => {
      const { shell, engine } = extractTemplate(readInput(opts.source), opts.marker);
      writeFileSync(opts.shellOut, shell, "utf-8");
      writeFileSync(opts.engineOut, engine, "utf-8");
      io.log("OK - generated:");
      io.log(`- ${opts.shellOut}`);
      io.log(`- ${opts.engineOut}`);
    });

  return program;
}

/** Runs one command line (without the node and script arguments) and returns the exit code. */
export async function runCli(args: string[], io: CliIO = processIO): Promise<number> {
  // Strip standalone "--" so commander parses options correctly
  const argv = args.filter((x) => x !== "--");
  try {
    await buildProgram(io).parseAsync(argv, { from: "user" });
    return 0;
  } catch (e) {
    // Commander has already written its own usage errors
    if (e instanceof CommanderError) return e.exitCode;
    io.error(e instanceof Error ? e.message : String(e));
    return 1;
  }
}
