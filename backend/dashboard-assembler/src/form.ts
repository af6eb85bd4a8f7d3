/**
 * Paste/upload page served at GET /. A chosen file is read into the
 * textarea in the browser, so both inputs post the same `payload` field;
 * `source` records which one filled it.
 */

export type FormPageState = {
  errors?: string[];
  payloadText?: string;
};

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function renderErrors(errors: string[]): string {
  if (errors.length === 0) return "";
  const items = errors.map((e) => `<li>${escapeHtml(e)}</li>`).join("");
  return `<div class="errors" role="alert"><ul>${items}</ul></div>`;
}

export function renderFormPage(state: FormPageState = {}): string {
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>DSCR Dashboard Assembler</title>
<style>
  body { font-family: system-ui, sans-serif; max-width: 960px; margin: 2rem auto; padding: 0 1rem; }
  textarea { width: 100%; height: 260px; font-family: ui-monospace, monospace; }
  .errors { background: #fdecea; border: 1px solid #f5c2c0; padding: .5rem 1rem; margin-bottom: 1rem; }
  .actions { margin-top: 1rem; display: flex; gap: .5rem; }
</style>
</head>
<body>
<h1>DSCR Dashboard Assembler</h1>
<p>Upload or paste your JSON payload and download the assembled HTML dashboard.</p>
${renderErrors(state.errors ?? [])}
<form method="post" action="/dashboard/assemble">
  <label for="payload">Paste JSON payload</label>
  <input type="hidden" id="source" name="source" value="paste">
  <textarea id="payload" name="payload">${escapeHtml(state.payloadText ?? "")}</textarea>
  <label for="upload">Or upload JSON file</label>
  <input id="upload" type="file" accept=".json,application/json">
  <div class="actions">
    <button type="submit">Download DSCR Dashboard HTML</button>
    <button type="submit" formaction="/dashboard/payload">Download Payload JSON (backup)</button>
  </div>
</form>
<script>
  document.getElementById("upload").addEventListener("change", function (ev) {
    var file = ev.target.files && ev.target.files[0];
    if (!file) return;
    file.text().then(function (text) {
      document.getElementById("payload").value = text;
      document.getElementById("source").value = "upload";
    });
  });
</script>
</body>
</html>
`;
}
