/**
 * Process Registry
 *
 * Explicit mapping process id -> capability, populated at startup by
 * register() calls. Descriptions are validated once at registration and the
 * input schema is compiled once per process.
 */

import { ProcessNotFoundError } from './errors';
import { buildInputSchema, InputObjectSchema, parseInputs } from './input-schema';
import { Process, ProcessDescriptionSchema, ValidatedProcessDescription } from './process';

interface RegisteredProcess {
  process: Process;
  description: ValidatedProcessDescription;
  inputSchema: InputObjectSchema;
}

export class ProcessRegistry {
  private processes: Map<string, RegisteredProcess> = new Map();

  register(process: Process): void {
    const parsed = ProcessDescriptionSchema.safeParse(process.describe());
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new Error(`Invalid process description: ${issues}`);
    }

    const description = parsed.data;
    if (this.processes.has(description.id)) {
      throw new Error(`Process ${description.id} is already registered`);
    }

    this.processes.set(description.id, {
      process,
      description,
      inputSchema: buildInputSchema(description)
    });
  }

  has(processId: string): boolean {
    return this.processes.has(processId);
  }

  /**
   * Resolve a process capability
   * @throws ProcessNotFoundError
   */
  lookup(processId: string): Process {
    return this.entry(processId).process;
  }

  describe(processId: string): ValidatedProcessDescription {
    return this.entry(processId).description;
  }

  list(): ValidatedProcessDescription[] {
    return [...this.processes.values()]
      .map((registered) => registered.description)
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  getInputSchema(processId: string): InputObjectSchema {
    return this.entry(processId).inputSchema;
  }

  /**
   * Validate inputs against the declared schema, returning the normalized
   * inputs (defaults filled)
   * @throws InvalidInputError | ProcessNotFoundError
   */
  validateInputs(processId: string, inputs: unknown): Record<string, unknown> {
    return parseInputs(processId, this.getInputSchema(processId), inputs);
  }

  private entry(processId: string): RegisteredProcess {
    const registered = this.processes.get(processId);
    if (!registered) {
      throw new ProcessNotFoundError(processId);
    }
    return registered;
  }
}
