import { TimeoutError } from '../errors/timeout.error';

/**
 * Race a promise against a timer.
 * The timer is always cleared, so a settled call leaves nothing pending.
 *
 * @param operation - Name used in the TimeoutError message
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
