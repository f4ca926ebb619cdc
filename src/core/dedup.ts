import type { SeenSet } from '@/core/state-store';

export type FirstRunPolicy = 'seed' | 'notify';

interface Keyed {
  key: string;
}

/**
 * Returns the posts whose key is not in `seen`, in input order. Repeated keys
 * within `posts` count once (first occurrence wins).
 */
export function selectNew<T extends Keyed>(posts: readonly T[], seen: SeenSet): T[] {
  const emitted = new Set<string>();
  const fresh: T[] = [];

  for (const post of posts) {
    if (seen.has(post.key) || emitted.has(post.key)) {
      continue;
    }
    emitted.add(post.key);
    fresh.push(post);
  }

  return fresh;
}

export interface CyclePlan<T> {
  /** Posts to notify, in input order */
  deliver: T[];
  /** Keys to record as seen without notifying */
  seed: string[];
}

/**
 * Decides what one fetch of a source leads to. `seen` is undefined for a
 * source that has never been recorded; an existing but empty SeenSet is not a
 * first run.
 */
export function planCycle<T extends Keyed>(
  posts: readonly T[],
  seen: SeenSet | undefined,
  policy: FirstRunPolicy
): CyclePlan<T> {
  if (seen === undefined) {
    const fresh = selectNew(posts, new Set<string>());
    if (policy === 'seed') {
      return { deliver: [], seed: fresh.map(post => post.key) };
    }
    return { deliver: fresh, seed: [] };
  }

  return { deliver: selectNew(posts, seen), seed: [] };
}
