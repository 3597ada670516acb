/**
 * Pipeline parameters: typed values with defaults, overridable from the
 * command line and substituted into every string of the pipeline file as
 * `<< pipeline.parameters.name >>`.
 */

import {ConfigError} from "../../errors";
import type {ParameterDefinition} from "./pipeline-schema";

export type ParameterValue = string | number | boolean;

const REFERENCE_RE = /<<\s*pipeline\.parameters\.([A-Za-z_][A-Za-z0-9_-]*)\s*>>/g;
const WHOLE_REFERENCE_RE = /^<<\s*pipeline\.parameters\.([A-Za-z_][A-Za-z0-9_-]*)\s*>>$/;

/** Parse `key=value` pairs; the value may itself contain `=`. */
export function parseOverrides(pairs: readonly string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  const issues: string[] = [];
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      issues.push(`expected key=value, got "${pair}"`);
      continue;
    }
    overrides[pair.slice(0, separator).trim()] = pair.slice(separator + 1);
  }
  if (issues.length > 0) {
    throw new ConfigError("Invalid parameter override", issues);
  }
  return overrides;
}

type Coerced = {ok: true; value: ParameterValue} | {ok: false; issue: string};

function coerce(name: string, definition: ParameterDefinition, raw: ParameterValue): Coerced {
  const mismatch = (expected: string): Coerced => ({
    ok: false,
    issue: `parameter "${name}" expects ${expected}, got ${JSON.stringify(raw)}`,
  });

  switch (definition.type) {
    case "string":
      return typeof raw === "string" ? {ok: true, value: raw} : mismatch("a string");
    case "integer":
      if (typeof raw === "number" && Number.isInteger(raw)) return {ok: true, value: raw};
      if (typeof raw === "string" && /^-?\d+$/.test(raw.trim())) return {ok: true, value: Number.parseInt(raw, 10)};
      return mismatch("an integer");
    case "boolean":
      if (typeof raw === "boolean") return {ok: true, value: raw};
      if (raw === "true" || raw === "false") return {ok: true, value: raw === "true"};
      return mismatch("a boolean");
    case "enum": {
      const allowed = definition.enum ?? [];
      if (typeof raw === "string" && allowed.includes(raw)) return {ok: true, value: raw};
      return mismatch(`one of [${allowed.join(", ")}]`);
    }
  }
}

/**
 * Final value of every declared parameter: override, else default.
 * @throws ConfigError for unknown overrides, missing values or type mismatches.
 */
export function resolveParameters(
  definitions: Record<string, ParameterDefinition>,
  overrides: Record<string, string> = {},
): Record<string, ParameterValue> {
  const issues: string[] = [];
  const values: Record<string, ParameterValue> = {};

  for (const name of Object.keys(overrides)) {
    if (!(name in definitions)) {
      issues.push(`unknown parameter "${name}"`);
    }
  }

  for (const [name, definition] of Object.entries(definitions)) {
    if (definition.type === "enum" && !definition.enum) {
      issues.push(`enum parameter "${name}" declares no values`);
      continue;
    }
    const raw = name in overrides ? overrides[name] : definition.default;
    if (raw === undefined) {
      issues.push(`parameter "${name}" has no default and no value was given`);
      continue;
    }
    const coerced = coerce(name, definition, raw);
    if (coerced.ok) {
      values[name] = coerced.value;
    } else {
      issues.push(coerced.issue);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError("Invalid pipeline parameters", issues);
  }
  return values;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Substitute parameter references in every string of `node`. A string that
 * is exactly one reference takes the parameter's typed value.
 * @throws ConfigError listing every reference to an undeclared parameter.
 */
export function substituteParameters(node: unknown, values: Record<string, ParameterValue>): unknown {
  const undeclared = new Set<string>();

  const visit = (current: unknown): unknown => {
    if (typeof current === "string") {
      const whole = WHOLE_REFERENCE_RE.exec(current);
      if (whole) {
        if (whole[1] in values) return values[whole[1]];
        undeclared.add(whole[1]);
        return current;
      }
      return current.replace(REFERENCE_RE, (match: string, name: string) => {
        if (name in values) return String(values[name]);
        undeclared.add(name);
        return match;
      });
    }
    if (Array.isArray(current)) {
      return current.map(visit);
    }
    if (isPlainObject(current)) {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(current)) {
        result[key] = visit(value);
      }
      return result;
    }
    return current;
  };

  const substituted = visit(node);
  if (undeclared.size > 0) {
    throw new ConfigError(
      "Reference to undeclared parameter",
      Array.from(undeclared, (name) => `<< pipeline.parameters.${name} >>`),
    );
  }
  return substituted;
}
