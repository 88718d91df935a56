export interface PostRecord {
  id: string; // opaque, compared as a string
  content: string;
  timestamp: string; // ISO, only used to order a batch
  link: string; // absolute
}

export type ExtractOutcome =
  | { ok: true; post: PostRecord }
  | { ok: false; reason: string };

export interface NoveltyResult {
  newPosts: PostRecord[];
  cursor: string;
}

export type RunPhase =
  | "LOADING_CURSOR"
  | "FETCHING"
  | "EXTRACTING"
  | "FILTERING"
  | "NO_NEW_POSTS"
  | "DELIVERING"
  | "PERSISTING";

export interface RunSummary {
  outcome: "fetch-failed" | "no-new-posts" | "delivered";
  candidates: number;
  newPosts: number;
  delivered: number;
  failed: number;
  cursor: string;
  cursorWritten: boolean;
}
