import type { NoveltyResult, PostRecord } from "./types.js";

/**
 * Selects the posts whose id sorts after `cursor` and computes the next cursor.
 *
 * Ids are compared as plain strings, so this only tracks recency while the
 * source issues ids of one width and alphabet. An empty cursor (first run)
 * treats every candidate as new.
 */
export function filterNewPosts(cursor: string, candidates: readonly PostRecord[]): NoveltyResult {
  // Timestamp order decides delivery order only, never selection
  const ordered = [...candidates].sort((a, b) =>
    a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0
  );

  const newPosts: PostRecord[] = [];
  let next = cursor;

  for (const post of ordered) {
    if (cursor === "" || post.id > cursor) {
      newPosts.push(post);
      if (next === "" || post.id > next) next = post.id;
    }
  }

  return { newPosts, cursor: next };
}
