import { clearTimeout, setTimeout } from 'node:timers';

export type DeadlineOutcome<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Wait for `work` for at most `timeoutMs`. The work itself is not cancelled; the caller
 * decides what to do with whatever is still running.
 */
export async function settleWithin<T>(
  work: Promise<T>,
  timeoutMs: number | undefined,
): Promise<DeadlineOutcome<T>> {
  if (timeoutMs === undefined) {
    return { timedOut: false, value: await work };
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<DeadlineOutcome<T>>((resolve) => {
    timer = setTimeout(() => {
      resolve({ timedOut: true });
    }, timeoutMs);
  });
  const completion = (async (): Promise<DeadlineOutcome<T>> => ({
    timedOut: false,
    value: await work,
  }))();

  try {
    return await Promise.race([completion, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
