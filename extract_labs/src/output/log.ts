export type Log = (message: string) => void;

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
