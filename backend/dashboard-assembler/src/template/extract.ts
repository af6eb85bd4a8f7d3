/**
 * Slice a reference dashboard into shell + engine fragments.
 * The data block runs from `const auditedYearsDetected =` through the
 * `const bankRules = ...;` line and is replaced by the injection marker.
 */

import { INJECTION_MARKER } from "../config.js";
import { TemplateExtractionError } from "../errors.js";
import type { TemplateFragments } from "./fragments.js";

const DATA_START = /\n\s*const\s+auditedYearsDetected\s*=/;
const DATA_END = /\n\s*const\s+bankRules\s*=\s*.*?;\s*\n/s;

export function extractTemplate(html: string, marker: string = INJECTION_MARKER): TemplateFragments {
  const start = DATA_START.exec(html);
  if (!start) {
    throw new TemplateExtractionError("Cannot find 'const auditedYearsDetected =' in source template");
  }
  const dataStart = start.index;

  const end = DATA_END.exec(html.slice(dataStart));
  if (!end) {
    throw new TemplateExtractionError("Cannot find 'const bankRules = ...;' after auditedYearsDetected");
  }
  const dataEnd = dataStart + end.index + end[0].length;

  return {
    shell: html.slice(0, dataStart).trimEnd() + "\n\n  " + marker + "\n",
    engine: html.slice(dataEnd),
  };
}
