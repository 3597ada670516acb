/**
 * Parses the step environment file named by `$PIPEWRIGHT_ENV`.
 *
 * Accepted lines: `KEY=VALUE` and `export KEY=VALUE`. Values may be wrapped in
 * single or double quotes. Blank lines, `#` comments and lines that are not
 * assignments are ignored; a later assignment overrides an earlier one.
 */

const ASSIGNMENT_RE = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      const inner = value.slice(1, -1);
      return first === '"' ? inner.replace(/\\(["\\$`])/g, "$1").replace(/\\n/g, "\n") : inner;
    }
  }
  return value;
}

export function parseEnvFile(content: string): Record<string, string> {
  const bindings: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) continue;
    const match = ASSIGNMENT_RE.exec(line);
    if (!match) continue;
    bindings[match[1]] = unquote(match[2].trim());
  }
  return bindings;
}
