// Notification tests
import type { InternalAxiosRequestConfig } from "axios";
import { buildPostMessage, MAX_HEADER_LENGTH, MAX_TEXT_LENGTH, PushNotifier } from "../notifier";
import { post, silentLogger, stubHttp } from "./helpers";

const ENDPOINT = "https://push.example/v2/bot/message/push";

describe("buildPostMessage", () => {
  it("should put the header, body and link on separate paragraphs", () => {
    const message = buildPostMessage("New post", post("1", "a", "Hello there"));

    expect(message).toBe("New post\n\nHello there\n\nLink: https://social.example/@someone/1");
  });

  it("should trim long bodies but keep the link", () => {
    const message = buildPostMessage("New post", post("1", "a", "x".repeat(6000)));

    expect(message).toHaveLength(MAX_TEXT_LENGTH);
    expect(message.startsWith("New post\n\nxxx")).toBe(true);
    expect(message.endsWith("x…\n\nLink: https://social.example/@someone/1")).toBe(true);
  });

  it("should trim on whole characters when the body has emoji", () => {
    const message = buildPostMessage("New post", post("1", "a", "😀".repeat(6000)));

    expect(Array.from(message)).toHaveLength(MAX_TEXT_LENGTH);
    expect(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/.test(message)).toBe(false);
    expect(message.endsWith("😀…\n\nLink: https://social.example/@someone/1")).toBe(true);
  });

  it("should keep an emoji body that fits by character count", () => {
    const body = "😀".repeat(3000);

    expect(buildPostMessage("New post", post("1", "a", body))).toBe(
      `New post\n\n${body}\n\nLink: https://social.example/@someone/1`
    );
  });

  it("should cap an oversized header and keep the link", () => {
    const message = buildPostMessage("H".repeat(5000), post("1", "a", "short"));

    expect(message).toBe(`${"H".repeat(MAX_HEADER_LENGTH)}\n\nshort\n\nLink: https://social.example/@someone/1`);
  });
});

describe("PushNotifier", () => {
  function notifier(
    handler: (config: InternalAxiosRequestConfig) => { status: number; data?: unknown },
    creds: { channelToken?: string; recipientId?: string } = { channelToken: "test-token", recipientId: "U-test" }
  ) {
    return new PushNotifier({
      http: stubHttp(handler),
      logger: silentLogger(),
      endpoint: ENDPOINT,
      timeoutMs: 1000,
      ...creds,
    });
  }

  it("should post a text message with a bearer credential", async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const n = notifier((config) => {
      requests.push(config);
      return { status: 200, data: "{}" };
    });

    await expect(n.send("hello")).resolves.toBe(true);

    expect(requests).toHaveLength(1);
    const [req] = requests;
    expect(req.method).toBe("post");
    expect(req.url).toBe(ENDPOINT);
    expect(req.headers.get("Authorization")).toBe("Bearer test-token");
    expect(JSON.parse(String(req.data))).toEqual({
      to: "U-test",
      messages: [{ type: "text", text: "hello" }],
    });
  });

  it("should report a non-200 reply as a failure", async () => {
    const n = notifier(() => ({ status: 400, data: '{"message":"bad request"}' }));

    await expect(n.send("hello")).resolves.toBe(false);
  });

  it("should report a transport error as a failure", async () => {
    const n = notifier(() => {
      throw new Error("socket hang up");
    });

    await expect(n.send("hello")).resolves.toBe(false);
  });

  it("should not be configured without a credential or recipient", async () => {
    const calls = jest.fn(() => ({ status: 200 }));

    expect(notifier(calls, { recipientId: "U-test" }).isConfigured()).toBe(false);
    expect(notifier(calls, { channelToken: "test-token" }).isConfigured()).toBe(false);
    expect(notifier(calls).isConfigured()).toBe(true);
    await expect(notifier(calls, { channelToken: "test-token" }).send("hello")).resolves.toBe(false);
    expect(calls).not.toHaveBeenCalled();
  });
});
