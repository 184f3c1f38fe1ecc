const USER_AGENT = "Mozilla/5.0 (compatible; newswire/1.0; +https://example.org/newswire)";

export class HttpStatusError extends Error {
  name = "HttpStatusError";

  constructor(
    readonly status: number,
    readonly url: string,
  ) {
    super(`HTTP ${status} from ${url}`);
  }
}

export interface TextResponse {
  /** Final URL after redirects. */
  url: string;
  text: string;
}

export async function fetchText(
  url: string,
  signal: AbortSignal,
  accept = "text/html,application/xhtml+xml,application/rss+xml,application/xml;q=0.9,*/*;q=0.8",
): Promise<TextResponse> {
  const resp = await fetch(url, {
    headers: { "User-Agent": USER_AGENT, Accept: accept },
    signal,
    redirect: "follow",
  });
  if (!resp.ok) {
    throw new HttpStatusError(resp.status, url);
  }
  return { url: resp.url || url, text: await resp.text() };
}
