export const DEADLINE_EXCEEDED = Symbol('deadline-exceeded');

/**
 * Races `work` against a timer. The work is not cancelled when the timer
 * wins; callers must make sure it cannot reject unobserved.
 */
export async function withDeadline<T>(
  work: Promise<T>,
  ms: number,
): Promise<T | typeof DEADLINE_EXCEEDED> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof DEADLINE_EXCEEDED>((resolve) => {
    timer = setTimeout(() => resolve(DEADLINE_EXCEEDED), ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
