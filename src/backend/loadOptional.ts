/**
 * Optional Module Loading
 *
 * Codec bindings are not dependencies of this package; users install the
 * ones they want. A missing module surfaces as a load failure that the
 * registry reports (probe) or rethrows (explicit override).
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Import a module by name and return its namespace as is. A CommonJS module
 * shows up with its exports under `default`; callers unwrap that themselves.
 */
export async function importOptional(specifier: string): Promise<Record<string, unknown>> {
  let namespace: unknown;
  try {
    namespace = await import(specifier);
  } catch (err) {
    throw new Error(`Module ${specifier} is not installed`, { cause: err });
  }
  if (!isRecord(namespace)) throw new Error(`Module ${specifier} has no exports`);
  return namespace;
}
