import { HardwareTimeoutError } from './errors.utils';

/**
 * Races a (possibly synchronous) hardware call against a timer.
 * The underlying call is not cancelled; its late result is discarded.
 */
export async function withTimeout<T>(
  operation: string,
  call: () => T | Promise<T>,
  timeoutMs: number
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new HardwareTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([Promise.resolve().then(call), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
