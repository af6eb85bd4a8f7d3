import { test } from "node:test";
import assert from "node:assert/strict";

import { resolveBankRules, resolvedBankRulesFull } from "../rules/resolve.js";

const FULL = {
  banks: {
    "Harbour Bank": { models: { financial: { enabled: true, min_dscr: 1.25 } } },
  },
};

const HARBOUR = {
  allowFinancial: true,
  allowNonFinancial: false,
  minFinancial: 1.25,
  minNonFinancial: null,
};

function countingLoader(doc: Record<string, unknown> | undefined) {
  const loader = () => {
    loader.calls += 1;
    return doc;
  };
  loader.calls = 0;
  return loader;
}

test("supplied bankRules win and are used verbatim", () => {
  const supplied = { Custom: { allowFinancial: true, note: "kept" } };
  const loader = countingLoader(FULL);
  const res = resolveBankRules({ bankRules: supplied, bankRulesFull: FULL }, loader);
  assert.deepEqual(res, { kind: "supplied", bankRules: supplied });
  assert.equal(loader.calls, 0);
});

test("bankRulesFull in the payload is derived before the default file", () => {
  const loader = countingLoader({ banks: { Other: {} } });
  const res = resolveBankRules({ bankRulesFull: FULL }, loader);
  assert.deepEqual(res, {
    kind: "derived",
    source: "payload",
    bankRules: { "Harbour Bank": HARBOUR },
    bankRulesFull: FULL,
  });
  assert.equal(loader.calls, 0);
});

test("null bankRules counts as not supplied", () => {
  const res = resolveBankRules({ bankRules: null, bankRulesFull: FULL }, countingLoader(undefined));
  assert.equal(res.kind, "derived");
});

test("falls back to the default rules document", () => {
  const loader = countingLoader(FULL);
  const res = resolveBankRules({}, loader);
  assert.deepEqual(res, {
    kind: "derived",
    source: "default-file",
    bankRules: { "Harbour Bank": HARBOUR },
    bankRulesFull: FULL,
  });
  assert.equal(loader.calls, 1);
});

test("no rules anywhere yields an empty lookup", () => {
  const res = resolveBankRules({ bankRules: null, bankRulesFull: null }, countingLoader(undefined));
  assert.deepEqual(res, { kind: "fallback-missing", bankRules: {} });
});

test("resolvedBankRulesFull follows the resolution", () => {
  const derived = resolveBankRules({}, countingLoader(FULL));
  assert.equal(resolvedBankRulesFull({}, derived), FULL);

  const supplied = resolveBankRules({ bankRules: {}, bankRulesFull: FULL }, countingLoader(undefined));
  assert.equal(resolvedBankRulesFull({ bankRulesFull: FULL }, supplied), FULL);

  const missing = resolveBankRules({}, countingLoader(undefined));
  assert.equal(resolvedBankRulesFull({}, missing), undefined);
});
