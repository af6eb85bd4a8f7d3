/**
 * Dashboard assembly routes.
 * Exports the Fastify plugin plus the assembly building blocks.
 */

import type { FastifyInstance, FastifyPluginOptions, FastifyReply, FastifyRequest } from "fastify";
import type { AssemblerConfig } from "./config.js";
import { AssemblyError, PayloadParseError, PayloadValidationError, isDashboardRequestError } from "./errors.js";
import { renderFormPage } from "./form.js";
import { parsePayloadText } from "./payload/parse.js";
import { requireValidPayload } from "./payload/validate.js";
import { isRecord } from "./rules/derive.js";
import { buildDashboard } from "./template/assemble.js";
import type { DashboardPayload, PayloadSource } from "./types.js";

export type DashboardPluginOptions = FastifyPluginOptions & {
  config: AssemblerConfig;
};

const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded";

/** What the client sent, before any parsing that can fail */
type Submission =
  | { kind: "form"; text: string; source: PayloadSource }
  | { kind: "text"; text: string }
  | { kind: "json"; value: unknown };

function readSubmission(req: FastifyRequest): Submission {
  const contentType = req.headers["content-type"] ?? "";
  const body = req.body;
  if (contentType.startsWith(FORM_CONTENT_TYPE) && isRecord(body)) {
    return {
      kind: "form",
      text: typeof body.payload === "string" ? body.payload : "",
      source: body.source === "upload" ? "upload" : "paste",
    };
  }
  if (contentType.startsWith("text/plain") && typeof body === "string") {
    return { kind: "text", text: body };
  }
  return { kind: "json", value: body };
}

function acceptPayload(submission: Submission): DashboardPayload {
  if (submission.kind === "json") {
    if (submission.value === undefined) {
      throw new PayloadParseError("Missing request body");
    }
    return requireValidPayload(submission.value);
  }
  if (submission.text.trim() === "") {
    throw new PayloadParseError("Provide a payload to assemble the dashboard.");
  }
  const source = submission.kind === "form" ? submission.source : "paste";
  return requireValidPayload(parsePayloadText(submission.text, source));
}

function attachment(fileName: string): string {
  return `attachment; filename="${fileName}"`;
}

function sendFailure(req: FastifyRequest, reply: FastifyReply, submission: Submission, e: unknown) {
  if (!isDashboardRequestError(e)) throw e;

  const error = e instanceof AssemblyError ? `Assembly failed: ${e.message}` : e.message;
  req.log.warn({ err: e }, "dashboard request rejected");

  if (submission.kind === "form") {
    const messages = e instanceof PayloadValidationError ? e.issues : [error];
    return reply
      .status(e.statusCode)
      .type("text/html; charset=utf-8")
      .send(renderFormPage({ errors: messages, payloadText: submission.text }));
  }
  if (e instanceof PayloadValidationError) {
    return reply.status(e.statusCode).send({ error: "Payload validation failed", issues: e.issues });
  }
  return reply.status(e.statusCode).send({ error });
}

export async function dashboardPlugin(
  fastify: FastifyInstance,
  opts: DashboardPluginOptions
): Promise<void> {
  const { config } = opts;

  fastify.addContentTypeParser(FORM_CONTENT_TYPE, { parseAs: "string" }, (_req, body, done) => {
    const text = typeof body === "string" ? body : body.toString("utf-8");
    done(null, Object.fromEntries(new URLSearchParams(text)));
  });

  fastify.get("/", async (_req, reply) => {
    return reply.type("text/html; charset=utf-8").send(renderFormPage());
  });

  fastify.post("/dashboard/assemble", async (req, reply) => {
    const submission = readSubmission(req);
    try {
      const payload = acceptPayload(submission);
      const { html, resolution } = buildDashboard(payload, config);
      req.log.info(
        { bankRules: resolution.kind, banks: Object.keys(resolution.bankRules).length },
        "dashboard assembled"
      );
      return reply
        .type("text/html; charset=utf-8")
        .header("content-disposition", attachment(config.dashboardFileName))
        .send(html);
    } catch (e) {
      return sendFailure(req, reply, submission, e);
    }
  });

  fastify.post("/dashboard/payload", async (req, reply) => {
    const submission = readSubmission(req);
    try {
      const payload = acceptPayload(submission);
      return reply
        .type("application/json; charset=utf-8")
        .header("content-disposition", attachment(config.payloadFileName))
        .send(JSON.stringify(payload, null, 2));
    } catch (e) {
      return sendFailure(req, reply, submission, e);
    }
  });
}

export { deriveBankRules, deriveBankRule } from "./rules/derive.js";
export { resolveBankRules } from "./rules/resolve.js";
export { assembleHtml, buildDashboard } from "./template/assemble.js";
export { buildInjectionBlock, INJECTED_CONSTANTS } from "./template/injection.js";
export { splitShell } from "./template/shell.js";
export { extractTemplate } from "./template/extract.js";
export { parsePayloadText, stripCodeFences } from "./payload/parse.js";
export { validatePayload, requireValidPayload } from "./payload/validate.js";
export * from "./errors.js";
export * from "./config.js";
export type {
  AssembledDashboard,
  BankEntryFull,
  BankRule,
  BankRules,
  BankRulesFull,
  BankRulesResolution,
  DashboardPayload,
  ModelRuleFull,
} from "./types.js";
