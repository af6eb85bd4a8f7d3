import { AssemblyError } from "../errors.js";
import type { ShellParts } from "../types.js";

/**
 * Split the shell right after the first injection marker.
 * The marker stays at the end of the prefix.
 */
export function splitShell(shell: string, marker: string): ShellParts {
  const idx = shell.indexOf(marker);
  if (idx === -1) {
    throw new AssemblyError(`Injection marker not found: ${marker}`);
  }
  const end = idx + marker.length;
  return { prefix: shell.slice(0, end), suffix: shell.slice(end) };
}
