/** Message of an unknown thrown value, for logs and result strings. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
