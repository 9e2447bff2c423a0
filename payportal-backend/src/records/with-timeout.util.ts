import { RecordSourceError } from './record-source.error';

/**
 * Runs `work` with an abort signal and rejects with a RecordSourceError when it
 * has not settled within `timeoutMs`. The signal is aborted once the time is up
 * so the underlying request stops too. A timeout of 0 waits indefinitely.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    return work(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the timeout error settles the race first
      reject(new RecordSourceError(`${label} timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
