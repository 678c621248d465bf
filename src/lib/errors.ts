export type Failure = { ok: false; reason: string };

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function failure(reason: string): Failure {
  return { ok: false, reason };
}
