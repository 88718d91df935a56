import type { AxiosInstance } from "axios";
import type { AppConfig } from "./config.js";
import { extractPosts, type PostSelectors } from "./extractor.js";
import { fetchProfilePage } from "./fetcher.js";
import type { Logger } from "./logger.js";
import { filterNewPosts } from "./novelty.js";
import { buildPostMessage, type Notifier } from "./notifier.js";
import type { CursorStore } from "./store.js";
import type { RunPhase, RunSummary } from "./types.js";

export interface MonitorDeps {
  config: Pick<
    AppConfig,
    "PROFILE_URL" | "SITE_ORIGIN" | "NOTIFY_HEADER" | "USER_AGENT" | "FETCH_TIMEOUT_MS"
  >;
  http: AxiosInstance;
  store: CursorStore;
  notifier: Notifier;
  logger: Logger;
  selectors?: PostSelectors;
  now?: () => Date;
}

/**
 * One pass of fetch, extract, filter, deliver and persist. Only cursor store
 * failures reject; everything else is logged and absorbed.
 */
export async function runMonitorOnce(deps: MonitorDeps): Promise<RunSummary> {
  const { config, store, notifier, logger } = deps;
  const enter = (phase: RunPhase) => logger.debug({ phase }, "Run phase");

  enter("LOADING_CURSOR");
  const cursor = await store.read();
  logger.info({ cursor: cursor || null }, "Checking profile for new posts");

  enter("FETCHING");
  const html = await fetchProfilePage(config.PROFILE_URL, {
    http: deps.http,
    logger,
    userAgent: config.USER_AGENT,
    timeoutMs: config.FETCH_TIMEOUT_MS,
  });
  const summary: RunSummary = {
    outcome: "no-new-posts",
    candidates: 0,
    newPosts: 0,
    delivered: 0,
    failed: 0,
    cursor,
    cursorWritten: false,
  };
  if (html === null) {
    logger.info("No posts found or fetch failed");
    return { ...summary, outcome: "fetch-failed" };
  }

  enter("EXTRACTING");
  const candidates = extractPosts(html, {
    profileUrl: config.PROFILE_URL,
    siteOrigin: config.SITE_ORIGIN,
    logger,
    selectors: deps.selectors,
    now: deps.now,
  });
  summary.candidates = candidates.length;
  logger.info({ count: candidates.length }, "Posts extracted");

  enter("FILTERING");
  const result = filterNewPosts(cursor, candidates);
  if (result.newPosts.length === 0) {
    enter("NO_NEW_POSTS");
    logger.info("No new posts");
    return summary;
  }
  summary.newPosts = result.newPosts.length;
  logger.info({ count: result.newPosts.length }, "New posts found");

  enter("DELIVERING");
  if (!notifier.isConfigured()) {
    logger.error("Notifier is not configured, skipping delivery for this run");
  } else {
    for (const post of result.newPosts) {
      const ok = await notifier.send(buildPostMessage(config.NOTIFY_HEADER, post));
      if (ok) {
        summary.delivered += 1;
        logger.info({ id: post.id }, "Post notified");
      } else {
        summary.failed += 1;
      }
    }
  }

  // Advances past every observed post, delivered or not
  enter("PERSISTING");
  await store.write(result.cursor);
  logger.info({ cursor: result.cursor }, "Cursor updated");

  return { ...summary, outcome: "delivered", cursor: result.cursor, cursorWritten: true };
}
