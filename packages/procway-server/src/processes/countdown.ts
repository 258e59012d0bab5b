import {
  ExecutionContext,
  InvalidInputError,
  JobDismissedError,
  OutputValues,
  Process,
  ProcessDescription,
  sleep
} from 'procway-jobs';

/**
 * Counts through a number of steps, reporting progress after each one and
 * stopping early once the job is dismissed
 */
export class CountdownProcess implements Process {
  describe(): ProcessDescription {
    return {
      id: 'countdown',
      title: 'Countdown',
      description: 'Runs the given number of steps, optionally pausing between them.',
      version: '1.0.0',
      jobControlOptions: ['sync-execute', 'async-execute', 'dismiss'],
      outputTransmission: ['value'],
      keywords: ['example', 'progress'],
      inputs: {
        steps: {
          title: 'Steps',
          schema: { type: 'integer', minimum: 1, maximum: 50 }
        },
        delay_ms: {
          title: 'Delay between steps (ms)',
          schema: { type: 'integer', minimum: 0, maximum: 10_000, default: 0 },
          minOccurs: 0
        }
      },
      outputs: {
        completed_steps: { title: 'Completed steps', schema: { type: 'integer' } }
      }
    };
  }

  async execute(inputs: Record<string, unknown>, context: ExecutionContext): Promise<OutputValues> {
    const { steps, delay_ms: delayMs } = inputs;
    if (typeof steps !== 'number' || typeof delayMs !== 'number') {
      throw new InvalidInputError("Inputs 'steps' and 'delay_ms' must be integers");
    }

    for (let step = 1; step <= steps; step++) {
      if (await context.isDismissed()) {
        throw new JobDismissedError(context.jobId);
      }
      if (delayMs > 0) await sleep(delayMs);
      await context.reportProgress(`Step ${step} of ${steps}`, (step / steps) * 100);
    }

    return { completed_steps: steps };
  }
}
