import Ajv, { ErrorObject, JSONSchemaType, ValidateFunction } from 'ajv';
import { MalformedAiOutputError } from '@domain/errors/domain.errors';

const FENCED_BLOCK = /```(?:json|JSON)?([\s\S]*?)```/g;

const ajv = new Ajv({ allErrors: true, coerceTypes: true });

/** Compiles a schema against the shared ajv instance (types coerced, all errors reported). */
export function compileSchema<T>(schema: JSONSchemaType<T>): ValidateFunction<T> {
  return ajv.compile(schema);
}

function lastFencedBlock(raw: string): string | undefined {
  let last: string | undefined;
  for (const match of raw.matchAll(FENCED_BLOCK)) {
    last = match[1];
  }
  return last?.trim();
}

function braceSlice(raw: string): string | undefined {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end === -1 || start >= end) return undefined;
  return raw.slice(start, end + 1);
}

/**
 * Every plausible JSON payload in a model response, best first: the last
 * fenced block, the outer braces inside that block, then the outer braces of
 * the whole text.
 */
export function jsonCandidates(raw: string): string[] {
  const text = raw.trim();
  const candidates: string[] = [];
  const fenced = lastFencedBlock(text);
  if (fenced) {
    candidates.push(fenced);
    const inner = braceSlice(fenced);
    if (inner) candidates.push(inner);
  }
  const outer = braceSlice(text);
  if (outer) candidates.push(outer);
  return [...new Set(candidates)];
}

/**
 * Picks the payload a model most likely meant as its answer: the last fenced
 * block, else the text between the first `{` and the last `}`.
 */
export function extractJsonPayload(raw: string): string {
  const [best] = jsonCandidates(raw);
  if (best === undefined) {
    throw new MalformedAiOutputError('response contains no JSON payload');
  }
  return best;
}

function describeErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors?.length) return 'schema mismatch';
  return errors.map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join(', ');
}

/**
 * Parses a model response into a schema-validated value. Candidates are tried
 * in order; the first that parses and validates wins.
 */
export function decodeStructured<T>(
  raw: string,
  validate: ValidateFunction<T>,
  label: string
): T {
  const candidates = jsonCandidates(raw);
  if (candidates.length === 0) {
    throw new MalformedAiOutputError(`${label}: response contains no JSON payload`);
  }

  let problem = 'schema mismatch';
  for (const candidate of candidates) {
    let value: unknown;
    try {
      value = JSON.parse(candidate);
    } catch (error) {
      problem = error instanceof Error ? error.message : 'invalid JSON';
      continue;
    }
    if (validate(value)) return value;
    problem = describeErrors(validate.errors);
  }

  throw new MalformedAiOutputError(`${label}: ${problem}`);
}
