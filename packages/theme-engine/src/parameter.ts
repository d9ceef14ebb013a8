/**
 * Theme Parameters
 *
 * Parameters make a theme customizable. Their values arrive as loosely typed
 * JSON, so every value passes through the validator of its declared type
 * before it is stored.
 */

import type { TextTransform } from "@apisite/markdown-utils";
import { ParameterFormatError } from "./errors.js";

export const THEME_PARAMETER_TYPE = [
  "string",
  "number",
  "boolean",
  "markdown",
  "uri",
  "array",
  "object",
] as const;
export type ThemeParameterType = (typeof THEME_PARAMETER_TYPE)[number];

/**
 * A validated parameter value.
 */
export type ParameterValue = string | number | boolean | unknown[] | Record<string, unknown>;

/**
 * A parameter definition whose default value has been validated.
 */
export interface ThemeParameter {
  /** Declared type */
  type: ThemeParameterType;

  /** What the parameter controls */
  description?: string;

  /** Validated default; for markdown parameters this is the transformed output */
  defaultValue?: ParameterValue;
}

/**
 * Outcome of validating one value.
 */
export type ParameterResult =
  | { ok: true; value: ParameterValue }
  | { ok: false; error: ParameterFormatError };

type Validator = (value: unknown) => ParameterResult;

/** Base used to accept relative URIs */
const RELATIVE_URI_BASE = "http://relative.invalid/";

const TYPE_LABELS: Record<ThemeParameterType, string> = {
  string: "String",
  number: "Number",
  boolean: "Boolean",
  markdown: "Markdown",
  uri: "Uri",
  array: "Array",
  object: "Object",
};

/**
 * Describe the JSON shape of a value for error messages.
 */
export function describeValueKind(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "bigint") return "number";
  return typeof value;
}

function formatValue(value: unknown): string {
  if (typeof value === "bigint") return value.toString();
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function mismatch(type: ThemeParameterType, value: unknown): ParameterResult {
  const received = describeValueKind(value);
  return {
    ok: false,
    error: new ParameterFormatError(
      `${TYPE_LABELS[type]} was expected but ${received} was provided: ${formatValue(value)}`,
      type,
      received,
    ),
  };
}

/**
 * Check if a value is a plain string-keyed object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check if a string parses as an absolute or a relative URI.
 */
export function isUriReference(value: string): boolean {
  try {
    new URL(value, RELATIVE_URI_BASE);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validators keyed by parameter type. The markdown validator only checks the
 * shape; the transform is applied by {@link validateParameter}.
 */
export const parameterValidators: Record<ThemeParameterType, Validator> = {
  string: (value) => (typeof value === "string" ? { ok: true, value } : mismatch("string", value)),
  markdown: (value) =>
    typeof value === "string" ? { ok: true, value } : mismatch("markdown", value),
  number: (value) => {
    if (typeof value === "bigint") return { ok: true, value: Number(value) };
    if (typeof value === "number" && !Number.isNaN(value)) return { ok: true, value };
    return mismatch("number", value);
  },
  boolean: (value) => (typeof value === "boolean" ? { ok: true, value } : mismatch("boolean", value)),
  uri: (value) => {
    if (typeof value !== "string") return mismatch("uri", value);
    if (!isUriReference(value)) {
      return {
        ok: false,
        error: new ParameterFormatError(`A valid URI was expected: ${value}`, "uri", "string"),
      };
    }
    return { ok: true, value };
  },
  array: (value) => (Array.isArray(value) ? { ok: true, value } : mismatch("array", value)),
  object: (value) => (isPlainObject(value) ? { ok: true, value } : mismatch("object", value)),
};

/**
 * Validate a value against a parameter type without throwing.
 *
 * A successfully validated markdown string is passed through `transform`, so
 * the returned value is ready to render.
 */
export function validateParameter(
  value: unknown,
  type: ThemeParameterType,
  transform?: TextTransform,
): ParameterResult {
  const result = parameterValidators[type](value);
  if (result.ok && type === "markdown" && transform && typeof result.value === "string") {
    return { ok: true, value: transform(result.value) };
  }
  return result;
}

/**
 * Validate a value against a parameter type.
 *
 * `null` and `undefined` mean "no value" and yield `undefined`.
 *
 * @throws {ParameterFormatError} When the value does not match the type
 */
export function validateParameterValue(
  value: unknown,
  type: ThemeParameterType,
  transform?: TextTransform,
): ParameterValue | undefined {
  if (value === null || value === undefined) return undefined;

  const result = validateParameter(value, type, transform);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Outcome of defining one parameter.
 */
export type ThemeParameterResult =
  | { ok: true; parameter: ThemeParameter }
  | { ok: false; error: ParameterFormatError };

/**
 * Define a parameter, validating its default value. A missing or `null`
 * default leaves the parameter without one.
 */
export function defineThemeParameter(
  definition: { type: ThemeParameterType; description?: string; defaultValue?: unknown },
  transform?: TextTransform,
): ThemeParameterResult {
  const parameter: ThemeParameter = { type: definition.type };
  if (definition.description !== undefined) {
    parameter.description = definition.description;
  }
  if (definition.defaultValue === undefined || definition.defaultValue === null) {
    return { ok: true, parameter };
  }

  const result = validateParameter(definition.defaultValue, definition.type, transform);
  if (!result.ok) {
    return result;
  }
  parameter.defaultValue = result.value;
  return { ok: true, parameter };
}
