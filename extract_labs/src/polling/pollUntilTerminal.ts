export const DEFAULT_POLL_INTERVAL_MS = 1000;

// 実行中とみなすステータス（それ以外は終了状態）
const NON_TERMINAL_STATUSES = ['running', 'notstarted'];

export type Sleep = (ms: number) => Promise<void>;

export type PollOptions = {
  intervalMs?: number;
  initialDelayMs?: number;
  sleep?: Sleep;
};

export type StatusResponse = {
  status?: string;
};

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function isTerminalStatus(status: string | undefined): boolean {
  if (status === undefined) return true;
  return !NON_TERMINAL_STATUSES.includes(status.toLowerCase());
}

/**
 * Repeatedly fetch an operation's status at a fixed interval until it
 * leaves Running/NotStarted, then return the last response.
 */
export async function pollUntilTerminal<T extends StatusResponse>(
  fetchStatus: () => Promise<T>,
  options: PollOptions = {},
): Promise<T> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const initialDelayMs = options.initialDelayMs ?? intervalMs;
  const wait = options.sleep ?? sleep;

  if (initialDelayMs > 0) await wait(initialDelayMs);

  let response = await fetchStatus();
  while (!isTerminalStatus(response.status)) {
    await wait(intervalMs);
    response = await fetchStatus();
  }

  return response;
}

export function isSucceeded(status: string | undefined): boolean {
  return status?.toLowerCase() === 'succeeded';
}
