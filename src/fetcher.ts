import type { AxiosInstance } from "axios";
import type { Logger } from "./logger.js";

export interface FetchDeps {
  http: AxiosInstance;
  logger: Logger;
  userAgent: string;
  timeoutMs: number;
}

/**
 * Downloads the profile page. Anything other than a 2xx HTML body is a soft
 * failure: it is logged and `null` is returned.
 */
export async function fetchProfilePage(url: string, deps: FetchDeps): Promise<string | null> {
  const { http, logger } = deps;
  try {
    const res = await http.get<unknown>(url, {
      headers: {
        "User-Agent": deps.userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      responseType: "text",
      timeout: deps.timeoutMs,
      validateStatus: () => true,
    });

    if (res.status < 200 || res.status >= 300) {
      logger.error({ url, status: res.status }, "Profile fetch failed");
      return null;
    }
    if (typeof res.data !== "string") {
      logger.error({ url, status: res.status }, "Profile fetch returned a non-text body");
      return null;
    }
    return res.data;
  } catch (err) {
    logger.error({ url, err }, "Profile fetch error");
    return null;
  }
}
