import { ExecutionContext, ExecutionError, InvalidInputError, OutputValues, Process, ProcessDescription } from 'procway-jobs';

/**
 * Upper-cases a text. The text "fail" is refused, which makes the failure
 * path easy to reach from outside.
 */
export class EchoProcess implements Process {
  describe(): ProcessDescription {
    return {
      id: 'echo',
      title: 'Echo',
      description: 'Returns the input text upper-cased, with its length in characters.',
      version: '1.0.0',
      jobControlOptions: ['sync-execute', 'async-execute', 'dismiss'],
      outputTransmission: ['value'],
      keywords: ['example', 'text'],
      inputs: {
        text: {
          title: 'Text',
          description: 'Text to echo',
          schema: { type: 'string', minLength: 1, maxLength: 1000 }
        }
      },
      outputs: {
        output_text: { title: 'Upper-cased text', schema: { type: 'string' } },
        length: { title: 'Length in characters', schema: { type: 'integer', minimum: 1 } }
      }
    };
  }

  async execute(inputs: Record<string, unknown>, context: ExecutionContext): Promise<OutputValues> {
    const text = inputs.text;
    if (typeof text !== 'string') {
      throw new InvalidInputError("Input 'text' must be a string");
    }
    if (text === 'fail') {
      throw new ExecutionError('Echo refused the text "fail"');
    }

    await context.reportProgress('Echoing text', 50);
    return { output_text: text.toUpperCase(), length: [...text].length };
  }
}
