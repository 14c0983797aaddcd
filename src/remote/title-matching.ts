/**
 * Clone identification.
 *
 * Clones are recognized by title alone. Every comparison goes through
 * matchesCloneTitle.
 */

/** Title given to the clone of a template for a project. */
export function cloneTitle(templateTitle: string, projectId: string): string {
  return `${templateTitle} (project: ${projectId})`;
}

/** Whether an existing dashboard title identifies the expected clone. */
export function matchesCloneTitle(candidate: string, expected: string): boolean {
  return candidate === expected;
}
