import { JSDOM } from "jsdom";
import type { Logger } from "./logger.js";
import type { ExtractOutcome, PostRecord } from "./types.js";
import { epochSeconds, resolveLink } from "./utils.js";

/** Markup varies between page templates, so each selector is a fallback list. */
export interface PostSelectors {
  container: string;
  id: string;
  content: string;
  time: string;
  link: string;
}

export const DEFAULT_SELECTORS: PostSelectors = {
  container: "div.status-card, article.status",
  id: "[data-id]",
  content: ".status__content, .post-content",
  time: "time, .status__relative-time",
  link: "a.status__relative-time, a.post-link",
};

export const CONTENT_PLACEHOLDER = "(content unavailable)";

export interface ExtractOptions {
  profileUrl: string;
  siteOrigin: string;
  logger: Logger;
  selectors?: PostSelectors;
  now?: () => Date;
}

type FieldStrategy = (node: Element) => string | undefined;

function attr(el: Element | null, name: string): string | undefined {
  const value = el?.getAttribute(name)?.trim();
  return value ? value : undefined;
}

function firstValue(node: Element, strategies: FieldStrategy[]): string | undefined {
  for (const strategy of strategies) {
    const value = strategy(node);
    if (value !== undefined) return value;
  }
  return undefined;
}

interface FieldStrategies {
  id: FieldStrategy[];
  content: FieldStrategy[];
  timestamp: FieldStrategy[];
  link: FieldStrategy[];
}

function fieldStrategies(selectors: PostSelectors): FieldStrategies {
  return {
    id: [(node) => attr(node.querySelector(selectors.id), "data-id"), (node) => attr(node, "id")],
    // An empty body is kept as empty; only a missing element gets the placeholder
    content: [(node) => node.querySelector(selectors.content)?.textContent?.trim()],
    timestamp: [(node) => attr(node.querySelector(selectors.time), "datetime")],
    link: [(node) => attr(node.querySelector(selectors.link), "href")],
  };
}

function extractOne(
  node: Element,
  strategies: FieldStrategies,
  options: ExtractOptions,
  now: () => Date
): ExtractOutcome {
  const rawLink = firstValue(node, strategies.link) ?? options.profileUrl;
  const link = resolveLink(rawLink, options.siteOrigin);
  if (link === null) {
    return { ok: false, reason: `unparseable link: ${rawLink}` };
  }

  const post: PostRecord = {
    id: firstValue(node, strategies.id) ?? `unknown-${epochSeconds(now())}`,
    content: firstValue(node, strategies.content) ?? CONTENT_PLACEHOLDER,
    timestamp: firstValue(node, strategies.timestamp) ?? now().toISOString(),
    link,
  };
  return { ok: true, post };
}

/** One outcome per post container, in document order. */
export function extractOutcomes(html: string, options: ExtractOptions): ExtractOutcome[] {
  if (!html.trim()) return [];

  const selectors = options.selectors ?? DEFAULT_SELECTORS;
  const now = options.now ?? (() => new Date());
  const strategies = fieldStrategies(selectors);
  const { window } = new JSDOM(html);

  try {
    return Array.from(window.document.querySelectorAll(selectors.container)).map((node) => {
      try {
        return extractOne(node, strategies, options, now);
      } catch (err) {
        return { ok: false, reason: `extraction failed: ${String(err)}` } satisfies ExtractOutcome;
      }
    });
  } finally {
    window.close();
  }
}

export function extractPosts(html: string, options: ExtractOptions): PostRecord[] {
  const posts: PostRecord[] = [];
  extractOutcomes(html, options).forEach((outcome, index) => {
    if (outcome.ok) {
      posts.push(outcome.post);
    } else {
      options.logger.warn({ index, reason: outcome.reason }, "Skipping post container");
    }
  });
  return posts;
}
