import { commandExists } from '../lib/process.js';
import { MissingDependencyError } from '../lib/errors.js';

/** Commands from `required` that do not resolve on PATH. */
export async function findMissing(required: readonly string[]): Promise<string[]> {
  const missing: string[] = [];
  for (const command of required) {
    if (!(await commandExists(command))) missing.push(command);
  }
  return missing;
}

export async function requireDependencies(required: readonly string[]): Promise<void> {
  const missing = await findMissing(required);
  if (missing.length > 0) throw new MissingDependencyError(missing);
}
