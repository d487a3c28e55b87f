export class HttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly statusText: string,
    readonly body: string,
  ) {
    super(`GET ${url} failed: ${status} ${statusText}${body ? ` - ${body.slice(0, 200)}` : ''}`);
    this.name = 'HttpError';
  }
}

type GetJsonOptions = {
  params?: Record<string, string>;
  headers?: Record<string, string>;
  timeoutMs: number;
};

export function buildUrl(baseUrl: string, endpoint: string, params: Record<string, string> = {}): string {
  const url = `${baseUrl}${endpoint}`;
  const query = new URLSearchParams(params).toString();
  return query ? `${url}?${query}` : url;
}

/**
 * GETs a JSON document. Throws `HttpError` on a non-2xx status and a `TimeoutError`
 * DOMException once `timeoutMs` elapses.
 */
export async function getJson(
  baseUrl: string,
  endpoint: string,
  { params, headers, timeoutMs }: GetJsonOptions,
): Promise<unknown> {
  const url = buildUrl(baseUrl, endpoint, params);
  const res = await fetch(url, {
    method: 'GET',
    headers,
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!res.ok) {
    const bodyText = await res.text().catch(() => '');
    throw new HttpError(url, res.status, res.statusText, bodyText);
  }

  return await res.json();
}
