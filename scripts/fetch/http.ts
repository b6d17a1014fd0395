import { ProxyAgent, setGlobalDispatcher } from "undici";

const proxyUrl =
  process.env.HTTPS_PROXY ??
  process.env.https_proxy ??
  process.env.HTTP_PROXY ??
  process.env.http_proxy ??
  null;

if (proxyUrl) {
  try {
    setGlobalDispatcher(new ProxyAgent(proxyUrl));
  } catch (error) {
    console.warn(`Failed to configure proxy agent for ${proxyUrl}: ${String(error)}`);
  }
}

function snippetOf(bodyText: string): string {
  return bodyText.slice(0, 300).replace(/\s+/g, " ");
}

export function buildQueryUrl(baseUrl: string, params: Record<string, string>): string {
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * Issues a single GET and parses the JSON body. Non-2xx responses and
 * unparsable bodies throw; nothing is retried.
 */
export async function request<T = unknown>(url: string, init: RequestInit = {}): Promise<T> {
  const headers = new Headers(init.headers ?? {});
  headers.set("Accept", "application/json");

  const response = await fetch(url, { ...init, method: "GET", headers });
  const bodyText = await response.text().catch(() => "");

  if (!response.ok) {
    throw new Error(`Network error for ${url} — ${response.status} ${response.statusText} — ${snippetOf(bodyText)}`);
  }
  if (!bodyText) {
    throw new Error(`Empty response body from ${url}`);
  }
  try {
    return JSON.parse(bodyText) as T;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse JSON from ${url} — ${reason} — ${snippetOf(bodyText)}`);
  }
}
