/**
 * JSON Schema validation engine using ajv.
 *
 * The bundled plan.schema.json checks document structure only; dependency
 * references are not resolved here.
 *
 * Two validators are compiled from it. `strict` applies every rule and backs
 * `pv validate`. `load` drops the `format` and `pattern` rules, so a plan with
 * a loose version string or date-only timestamps still loads.
 */

import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { PlanError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { isJsonObject, parseJson } from '../store/json.js';
import type { Plan } from '../types/plan.js';

// ajv and ajv-formats are CommonJS; under Node ESM the default import is module.exports.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/** Location of the bundled schema (same relative path from src/ and dist/). */
export const PLAN_SCHEMA_PATH = fileURLToPath(
  new URL('../../schemas/plan.schema.json', import.meta.url),
);

/** A single schema violation, flattened for display. */
export interface SchemaIssue {
  /** Dotted path into the document, or null for the root. */
  path: string | null;
  message: string;
}

export interface SchemaCheckResult {
  valid: boolean;
  issues: SchemaIssue[];
}

/** Which rule set a check applies. */
export type SchemaMode = 'strict' | 'load';

const VALUE_RULES = new Set(['format', 'pattern']);

const planValidators = new Map<SchemaMode, ValidateFunction<Plan>>();

function toSchemaObject(entries: Iterable<[string, unknown]>): SchemaObject {
  const schema: SchemaObject = {};
  for (const [key, value] of entries) schema[key] = value;
  return schema;
}

/** Load the bundled schema from disk. */
export function loadPlanSchema(): SchemaObject {
  const schema = parseJson(readFileSync(PLAN_SCHEMA_PATH, 'utf8'), PLAN_SCHEMA_PATH);
  if (!isJsonObject(schema)) {
    throw new PlanError(ExitCode.CONFIG_ERROR, `Schema is not an object: ${PLAN_SCHEMA_PATH}`);
  }
  return toSchemaObject(Object.entries(schema));
}

function stripValueRules(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(stripValueRules);
  if (!isJsonObject(value)) return value;
  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    if (VALUE_RULES.has(key) && typeof child === 'string') continue;
    result[key] = stripValueRules(child);
  }
  return result;
}

/**
 * Copy of a schema without string `format` and `pattern` keywords.
 * Property definitions are objects, so a property named `format` survives.
 */
export function withoutValueRules(schema: SchemaObject): SchemaObject {
  return toSchemaObject(
    Object.entries(schema).flatMap(([key, value]): Array<[string, unknown]> =>
      VALUE_RULES.has(key) && typeof value === 'string' ? [] : [[key, stripValueRules(value)]],
    ),
  );
}

function getPlanValidator(mode: SchemaMode = 'strict'): ValidateFunction<Plan> {
  let validator = planValidators.get(mode);
  if (!validator) {
    const ajv = new Ajv({
      allErrors: true,
      strict: false,
      allowUnionTypes: true,
    });
    addFormats(ajv);
    const schema = loadPlanSchema();
    validator = ajv.compile<Plan>(mode === 'load' ? withoutValueRules(schema) : schema);
    planValidators.set(mode, validator);
  }
  return validator;
}

/** Convert an ajv instancePath (`/phases/0/tasks/1`) to `phases.0.tasks.1`. */
function toDottedPath(instancePath: string): string | null {
  if (!instancePath) return null;
  return instancePath.replace(/^\//, '').split('/').join('.');
}

function toIssues(errors: ErrorObject[] | null | undefined): SchemaIssue[] {
  return (errors ?? []).map((e) => ({
    path: toDottedPath(e.instancePath),
    message: e.message ?? 'is invalid',
  }));
}

/** Type guard: does the value match the plan schema under every rule? */
export function isPlan(data: unknown): data is Plan {
  return getPlanValidator()(data);
}

/**
 * Check a value against the plan schema without throwing.
 */
export function checkPlanSchema(data: unknown): SchemaCheckResult {
  const validate = getPlanValidator();
  if (validate(data)) {
    return { valid: true, issues: [] };
  }
  return { valid: false, issues: toIssues(validate.errors) };
}

/**
 * Narrow a parsed document to a Plan, throwing VALIDATION_ERROR with every
 * violation listed when it does not match the schema. Loading uses the
 * `load` rules.
 */
export function assertPlan(data: unknown, source: string, mode: SchemaMode = 'load'): Plan {
  const validate = getPlanValidator(mode);
  if (validate(data)) return data;
  const issues = toIssues(validate.errors)
    .map((i) => `${i.path ?? '/'}: ${i.message}`)
    .join('; ');
  throw new PlanError(
    ExitCode.VALIDATION_ERROR,
    `Schema validation failed for ${source}: ${issues}`,
    { fix: 'Run: pv validate' },
  );
}
