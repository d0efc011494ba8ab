import { CollaboratorTimeoutError } from '../domain/index.js';

export const DEFAULT_COLLABORATOR_TIMEOUT_MS = 5000;

/**
 * Races a collaborator call against a timer.
 *
 * The underlying promise is not cancelled, only abandoned; the race
 * keeps a handler attached to it so a late rejection stays handled.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new CollaboratorTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
