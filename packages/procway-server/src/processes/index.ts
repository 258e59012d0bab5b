import { ProcessRegistry } from 'procway-jobs';
import { CountdownProcess } from './countdown';
import { EchoProcess } from './echo';

export { CountdownProcess, EchoProcess };

/**
 * Register the example processes shipped with the server
 */
export function registerBuiltinProcesses(registry: ProcessRegistry): ProcessRegistry {
  registry.register(new EchoProcess());
  registry.register(new CountdownProcess());
  return registry;
}
