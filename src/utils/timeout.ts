import { TimeoutError } from './errors';

/**
 * Races `fn` against a timer. The timer is cleared once the call settles so nothing
 * keeps the process alive. The underlying call is not cancelled; its late result is dropped.
 */
export async function withTimeout<T>(
  operation: string,
  ms: number,
  fn: () => Promise<T>,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, ms)), ms);
  });
  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
