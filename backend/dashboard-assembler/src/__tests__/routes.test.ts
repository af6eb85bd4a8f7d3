import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { buildApp } from "../app.js";
import { DEFAULT_ASSEMBLER_CONFIG, INJECTION_MARKER, type AssemblerConfig } from "../config.js";

const MINIMAL = {
  auditedYearsDetected: ["2023"],
  historicalData: {},
  companyFacilities: [],
  directorFacilities: [],
};

const SERVER = { port: 0, host: "127.0.0.1", corsOrigin: true, bodyLimitBytes: 1024 * 1024 };
const FORM = { "content-type": "application/x-www-form-urlencoded" };

function templates(withEngine = true): AssemblerConfig {
  const dir = mkdtempSync(join(tmpdir(), "dashboard-routes-"));
  writeFileSync(join(dir, "shell.html"), `<html><script>\n  ${INJECTION_MARKER}\n`, "utf-8");
  if (withEngine) writeFileSync(join(dir, "engine.txt"), "</script></html>\n", "utf-8");
  return {
    ...DEFAULT_ASSEMBLER_CONFIG,
    shellPath: join(dir, "shell.html"),
    enginePath: join(dir, "engine.txt"),
    bankRulesFullPath: join(dir, "bankRules.json"),
  };
}

async function app(config: AssemblerConfig = templates()) {
  return buildApp({ assembler: config, server: SERVER, logger: false });
}

function form(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}

test("GET /health reports which template files exist", async () => {
  const fastify = await app();
  const res = await fastify.inject({ method: "GET", url: "/health" });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { ok: true, assets: { shell: true, engine: true, defaultRules: false } });
  await fastify.close();
});

test("GET / serves the payload form", async () => {
  const fastify = await app();
  const res = await fastify.inject({ method: "GET", url: "/" });
  assert.equal(res.statusCode, 200);
  assert.equal(res.headers["content-type"], "text/html; charset=utf-8");
  assert.ok(res.body.includes('<form method="post" action="/dashboard/assemble">'));
  await fastify.close();
});

test("JSON payload downloads the assembled dashboard", async () => {
  const fastify = await app();
  const res = await fastify.inject({ method: "POST", url: "/dashboard/assemble", payload: MINIMAL });
  assert.equal(res.statusCode, 200);
  assert.equal(res.headers["content-type"], "text/html; charset=utf-8");
  assert.equal(res.headers["content-disposition"], 'attachment; filename="dscr_dashboard.html"');
  assert.ok(res.body.startsWith(`<html><script>\n  ${INJECTION_MARKER}\n`));
  assert.ok(res.body.includes("        const bankRules = {};\n"));
  assert.ok(res.body.endsWith("\n</script></html>\n"));
  await fastify.close();
});

test("fenced plain-text payload is accepted", async () => {
  const fastify = await app();
  const res = await fastify.inject({
    method: "POST",
    url: "/dashboard/assemble",
    headers: { "content-type": "text/plain" },
    payload: "```json\n" + JSON.stringify(MINIMAL) + "\n```",
  });
  assert.equal(res.statusCode, 200);
  assert.ok(res.body.includes('        const auditedYearsDetected = ["2023"];\n'));
  await fastify.close();
});

test("validation issues come back as a list", async () => {
  const fastify = await app();
  const { historicalData: _omit, ...rest } = MINIMAL;
  const res = await fastify.inject({ method: "POST", url: "/dashboard/assemble", payload: rest });
  assert.equal(res.statusCode, 422);
  assert.deepEqual(res.json(), {
    error: "Payload validation failed",
    issues: ["Missing required key: historicalData"],
  });
  await fastify.close();
});

test("malformed pasted JSON is a 400", async () => {
  const fastify = await app();
  const res = await fastify.inject({
    method: "POST",
    url: "/dashboard/assemble",
    headers: { "content-type": "text/plain" },
    payload: "{not json",
  });
  assert.equal(res.statusCode, 400);
  const body: { error: string } = res.json();
  assert.ok(body.error.startsWith("Paste JSON parse failed: "));
  await fastify.close();
});

test("malformed JSON body is rejected by the body parser", async () => {
  const fastify = await app();
  const res = await fastify.inject({
    method: "POST",
    url: "/dashboard/assemble",
    headers: { "content-type": "application/json" },
    payload: "{not json",
  });
  assert.equal(res.statusCode, 400);
  await fastify.close();
});

test("missing template files are reported as assembly failures", async () => {
  const config = templates(false);
  const fastify = await app(config);
  const res = await fastify.inject({ method: "POST", url: "/dashboard/assemble", payload: MINIMAL });
  assert.equal(res.statusCode, 500);
  assert.deepEqual(res.json(), { error: `Assembly failed: Missing: ${config.enginePath}` });
  await fastify.close();
});

test("unexpected failures are hidden behind a generic 500", async () => {
  const config = templates();
  // A directory passes the existence check but cannot be read as a file
  const fastify = await app({ ...config, shellPath: tmpdir() });
  const res = await fastify.inject({ method: "POST", url: "/dashboard/assemble", payload: MINIMAL });
  assert.equal(res.statusCode, 500);
  assert.deepEqual(res.json(), { error: "Internal server error" });
  await fastify.close();
});

test("form submission downloads the dashboard", async () => {
  const fastify = await app();
  const res = await fastify.inject({
    method: "POST",
    url: "/dashboard/assemble",
    headers: FORM,
    payload: form({ payload: JSON.stringify(MINIMAL), source: "paste" }),
  });
  assert.equal(res.statusCode, 200);
  assert.equal(res.headers["content-disposition"], 'attachment; filename="dscr_dashboard.html"');
  await fastify.close();
});

test("form errors re-render the form with the messages", async () => {
  const fastify = await app();
  const res = await fastify.inject({
    method: "POST",
    url: "/dashboard/assemble",
    headers: FORM,
    payload: form({ payload: JSON.stringify({ auditedYearsDetected: ["2023"] }), source: "paste" }),
  });
  assert.equal(res.statusCode, 422);
  assert.equal(res.headers["content-type"], "text/html; charset=utf-8");
  assert.ok(res.body.includes("<li>Missing required key: historicalData</li>"));
  assert.ok(res.body.includes("<li>Missing required key: directorFacilities</li>"));
  await fastify.close();
});

test("uploaded file parse errors name the upload", async () => {
  const fastify = await app();
  const res = await fastify.inject({
    method: "POST",
    url: "/dashboard/assemble",
    headers: FORM,
    payload: form({ payload: "{not json", source: "upload" }),
  });
  assert.equal(res.statusCode, 400);
  assert.ok(res.body.includes("<li>Upload JSON parse failed: "));
  assert.ok(res.body.includes("{not json</textarea>"));
  await fastify.close();
});

test("empty form asks for a payload", async () => {
  const fastify = await app();
  const res = await fastify.inject({
    method: "POST",
    url: "/dashboard/assemble",
    headers: FORM,
    payload: form({ payload: "   ", source: "paste" }),
  });
  assert.equal(res.statusCode, 400);
  assert.ok(res.body.includes("<li>Provide a payload to assemble the dashboard.</li>"));
  await fastify.close();
});

test("payload backup is pretty-printed JSON", async () => {
  const fastify = await app();
  const res = await fastify.inject({ method: "POST", url: "/dashboard/payload", payload: MINIMAL });
  assert.equal(res.statusCode, 200);
  assert.equal(res.headers["content-disposition"], 'attachment; filename="dscr_payload.json"');
  assert.equal(res.body, JSON.stringify(MINIMAL, null, 2));
  await fastify.close();
});
