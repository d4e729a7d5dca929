/**
 * Feature Commit Detection
 *
 * A feature commit is one whose subject line announces new functionality.
 * The predicate is swappable; the collector counts with whichever one the
 * caller configures.
 */

export type FeatureCommitPredicate = (message: string) => boolean;

/** Conventional-commit feature prefix: feat:, feat(scope):, feat!: */
const CONVENTIONAL_FEATURE = /^feat(\([^)]*\))?!?:/i;

/** Subject starting with an "add" verb: "Add retries", "added --json flag" */
const ADD_VERB = /^add(s|ed)?\b/i;

export const isFeatureCommit: FeatureCommitPredicate = (message) => {
  const subject = (message.split('\n')[0] ?? '').trim();
  return CONVENTIONAL_FEATURE.test(subject) || ADD_VERB.test(subject);
};

export function countFeatureCommits(
  messages: readonly string[],
  predicate: FeatureCommitPredicate = isFeatureCommit
): number {
  let count = 0;
  for (const message of messages) {
    if (predicate(message)) count++;
  }
  return count;
}
