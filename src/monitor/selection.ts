import type { SessionRecord } from "../parser";

/**
 * Where the selection lands after sessions are reloaded. Follows the
 * previously selected id when it is still present; otherwise keeps the
 * old position, clamped to the new list.
 */
export function restoreSelection(
  sessions: readonly SessionRecord[],
  previousId: string | null,
  previousIndex: number,
): number {
  if (sessions.length === 0) return -1;

  if (previousId !== null) {
    const found = sessions.findIndex((s) => s.sessionId === previousId);
    if (found !== -1) return found;
  }

  return Math.min(Math.max(previousIndex, 0), sessions.length - 1);
}

/** Step the selection by `delta`, wrapping at both ends. */
export function stepSelection(length: number, index: number, delta: number): number {
  if (length === 0) return -1;
  return (((index + delta) % length) + length) % length;
}
