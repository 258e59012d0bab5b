/**
 * Process capability contract
 *
 * A process is an opaque `execute(inputs) -> outputs` capability plus an OGC
 * API Processes description. Processes are registered explicitly at startup
 * (see ProcessRegistry); nothing registers itself on import.
 */

import { z } from 'zod';
import { OutputValues } from './types';

// ============================================================================
// Declared schemas (JSON Schema subset used by OGC process descriptions)
// ============================================================================

export type SchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ValueSchema {
  type?: SchemaType;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  minimum?: number;
  maximum?: number;
  enum?: Array<string | number | boolean>;
  items?: ValueSchema;
  default?: unknown;
  format?: string;
}

export const ValueSchemaSchema: z.ZodType<ValueSchema> = z.lazy(() =>
  z.object({
    type: z.enum(['string', 'number', 'integer', 'boolean', 'array', 'object']).optional(),
    minLength: z.number().int().min(0).optional(),
    maxLength: z.number().int().min(0).optional(),
    pattern: z.string().optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    enum: z.array(z.union([z.string(), z.number(), z.boolean()])).min(1).optional(),
    items: ValueSchemaSchema.optional(),
    default: z.unknown().optional(),
    format: z.string().optional()
  })
);

export const ProcessInputSchema = z.object({
  title: z.string(),
  description: z.string().optional(),
  schema: ValueSchemaSchema,
  /** OGC default is 1 (required) */
  minOccurs: z.number().int().min(0).optional(),
  maxOccurs: z.union([z.number().int().min(1), z.literal('unbounded')]).optional()
});

export const ProcessOutputSchema = z.object({
  title: z.string(),
  description: z.string().optional(),
  schema: ValueSchemaSchema
});

export const ProcessDescriptionSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'process id may only contain letters, digits, _ . -'),
  title: z.string(),
  description: z.string().optional(),
  version: z.string(),
  jobControlOptions: z.array(z.enum(['sync-execute', 'async-execute', 'dismiss'])).min(1),
  outputTransmission: z.array(z.enum(['value', 'reference'])).default(['value']),
  inputs: z.record(ProcessInputSchema),
  outputs: z.record(ProcessOutputSchema).refine((outputs) => Object.keys(outputs).length > 0, {
    message: 'a process must declare at least one output'
  }),
  keywords: z.array(z.string()).optional()
});

export type ProcessInputDescription = z.infer<typeof ProcessInputSchema>;
export type ProcessOutputDescription = z.infer<typeof ProcessOutputSchema>;
export type ProcessDescription = z.input<typeof ProcessDescriptionSchema>;
export type ValidatedProcessDescription = z.output<typeof ProcessDescriptionSchema>;

// ============================================================================
// Execution
// ============================================================================

/**
 * Handed to execute(); the only channel from a running process back to the
 * job record
 */
export interface ExecutionContext {
  jobId: string;
  processId: string;
  /**
   * Record progress. Writes are coalesced; only the changed fields are
   * persisted.
   */
  reportProgress(message?: string, percent?: number): Promise<void>;
  /**
   * Cooperative cancellation: true once the job has been dismissed. A
   * process that stops early should throw JobDismissedError.
   */
  isDismissed(): Promise<boolean>;
}

export interface Process {
  describe(): ProcessDescription;
  execute(inputs: Record<string, unknown>, context: ExecutionContext): Promise<OutputValues>;
}
