/**
 * Mirror naming
 *
 * A mirrored line is a copy of a user line from another surface of the same
 * symbol. Its name is derived from the source line name and source handle, so
 * each source line has at most one copy per destination.
 */

export const MIRROR_TAG = "_copied_";

export function mirrorName(sourceName: string, sourceHandle: number): string {
  return `${sourceName}${MIRROR_TAG}${sourceHandle}`;
}

/**
 * Mirrored lines are never used as sources
 */
export function isMirrorName(name: string): boolean {
  return name.includes(MIRROR_TAG);
}
