const ABSOLUTE_HTTP = /^https?:\/\//i;

/**
 * Makes `href` absolute against `origin`. Absolute links are kept as written
 * once they parse; `null` means the link cannot be used.
 */
export function resolveLink(href: string, origin: string): string | null {
  try {
    if (ABSOLUTE_HTTP.test(href)) {
      new URL(href);
      return href;
    }
    return new URL(href, origin).toString();
  } catch {
    return null;
  }
}

export function epochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
