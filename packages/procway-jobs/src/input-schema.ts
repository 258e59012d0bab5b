/**
 * Declared input schema -> zod
 *
 * Turns the JSON Schema subset of an OGC process description into a zod
 * object schema. Parsing also fills declared defaults, so requests that spell
 * out a default and requests that omit it normalize (and fingerprint) alike.
 */

import { z } from 'zod';
import { InvalidInputError } from './errors';
import { ProcessInputDescription, ValidatedProcessDescription, ValueSchema } from './process';

export type InputObjectSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

function literalList(values: ReadonlyArray<string | number | boolean>): string {
  return values.map((value) => JSON.stringify(value)).join(', ');
}

export function valueSchemaToZod(declared: ValueSchema): z.ZodTypeAny {
  let schema: z.ZodTypeAny;

  switch (declared.type) {
    case 'string': {
      let s = z.string();
      if (declared.minLength !== undefined) s = s.min(declared.minLength);
      if (declared.maxLength !== undefined) s = s.max(declared.maxLength);
      if (declared.pattern !== undefined) s = s.regex(new RegExp(declared.pattern));
      schema = s;
      break;
    }
    case 'number':
    case 'integer': {
      let n = z.number();
      if (declared.type === 'integer') n = n.int();
      if (declared.minimum !== undefined) n = n.min(declared.minimum);
      if (declared.maximum !== undefined) n = n.max(declared.maximum);
      schema = n;
      break;
    }
    case 'boolean':
      schema = z.boolean();
      break;
    case 'array':
      schema = z.array(declared.items ? valueSchemaToZod(declared.items) : z.unknown());
      break;
    case 'object':
      schema = z.record(z.unknown());
      break;
    default:
      schema = z.unknown();
  }

  const allowed = declared.enum;
  if (allowed) {
    schema = schema.refine((value) => allowed.some((candidate) => candidate === value), {
      message: `must be one of ${literalList(allowed)}`
    });
  }

  return schema;
}

function inputToZod(input: ProcessInputDescription): z.ZodTypeAny {
  const single = valueSchemaToZod(input.schema);
  const maxOccurs = input.maxOccurs ?? 1;

  let schema: z.ZodTypeAny = single;
  if (maxOccurs === 'unbounded') {
    schema = z.union([single, z.array(single).min(1)]);
  } else if (maxOccurs > 1) {
    schema = z.union([single, z.array(single).min(1).max(maxOccurs)]);
  }

  if (input.schema.default !== undefined) {
    return schema.default(input.schema.default);
  }
  return (input.minOccurs ?? 1) > 0 ? schema : schema.optional();
}

export function buildInputSchema(description: ValidatedProcessDescription): InputObjectSchema {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [id, input] of Object.entries(description.inputs)) {
    shape[id] = inputToZod(input);
  }
  return z.object(shape).strict();
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      if (issue.code === 'unrecognized_keys') {
        return `Unknown input(s) ${issue.keys.map((key) => `'${key}'`).join(', ')}`;
      }
      const where = issue.path.length > 0 ? `'${issue.path.join('.')}'` : 'inputs';
      return `Invalid input ${where}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate (and normalize) inputs against a compiled input schema
 */
export function parseInputs(processId: string, schema: InputObjectSchema, inputs: unknown): Record<string, unknown> {
  const parsed = schema.safeParse(inputs);
  if (!parsed.success) {
    throw new InvalidInputError(`Input validation failed for process ${processId}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
