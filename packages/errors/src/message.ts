/** The message of anything thrown, for embedding in another error's message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
