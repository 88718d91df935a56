import type { AxiosInstance } from "axios";
import type { Logger } from "./logger.js";
import type { PostRecord } from "./types.js";

/** The push API rejects text messages longer than this many characters. */
export const MAX_TEXT_LENGTH = 5000;
export const MAX_HEADER_LENGTH = 200;

// Counted in code points so a cut never splits a surrogate pair
function charLength(text: string): number {
  return Array.from(text).length;
}

function clip(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length <= max ? text : chars.slice(0, max).join("");
}

export function buildPostMessage(header: string, post: PostRecord): string {
  const head = clip(header, MAX_HEADER_LENGTH);
  const text = `${head}\n\n${post.content}\n\nLink: ${post.link}`;
  if (charLength(text) <= MAX_TEXT_LENGTH) return text;

  // Trim the body so the link survives
  const tail = `…\n\nLink: ${post.link}`;
  const room = Math.max(0, MAX_TEXT_LENGTH - charLength(head) - 2 - charLength(tail));
  return `${head}\n\n${clip(post.content, room)}${tail}`;
}

export interface Notifier {
  isConfigured(): boolean;
  send(text: string): Promise<boolean>;
}

export interface PushNotifierOptions {
  http: AxiosInstance;
  logger: Logger;
  endpoint: string;
  channelToken?: string;
  recipientId?: string;
  timeoutMs: number;
}

export class PushNotifier implements Notifier {
  private readonly logger: Logger;

  constructor(private readonly options: PushNotifierOptions) {
    this.logger = options.logger.child({ component: "notifier" });
  }

  isConfigured(): boolean {
    return Boolean(this.options.channelToken && this.options.recipientId);
  }

  /** Resolves `false` instead of throwing; a failed message never stops the batch. */
  async send(text: string): Promise<boolean> {
    const { http, endpoint, channelToken, recipientId, timeoutMs } = this.options;
    if (!channelToken || !recipientId) {
      this.logger.error("Notification credential or recipient missing");
      return false;
    }

    try {
      const res = await http.post<unknown>(
        endpoint,
        { to: recipientId, messages: [{ type: "text", text }] },
        {
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${channelToken}`,
          },
          timeout: timeoutMs,
          validateStatus: () => true,
        }
      );
      if (res.status === 200) {
        this.logger.info("Notification sent");
        return true;
      }
      this.logger.error({ status: res.status, body: res.data }, "Notification rejected");
      return false;
    } catch (err) {
      this.logger.error({ err }, "Notification error");
      return false;
    }
  }
}
