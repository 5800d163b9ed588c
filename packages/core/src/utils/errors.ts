/**
 * Extracts a readable message from an unknown error value.
 * Use in catch blocks: `outcome = failure('TOOL_ERROR', toErrorMessage(err))`
 */
export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

/**
 * Returns the `name` of an error-like value, or `undefined` for non-errors.
 */
export function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}
