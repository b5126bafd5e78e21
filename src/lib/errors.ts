// src/lib/errors.ts

/** Message of an Error, else the value as text. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? "unknown error");
}
