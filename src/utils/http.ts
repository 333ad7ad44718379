export type FetchLike = typeof fetch;

export class HttpError extends Error {
  constructor(public readonly status: number, public readonly url: string, public readonly body: string) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpError';
  }
}

export interface HttpRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  query?: Record<string, string | number | undefined>;
  body?: string | URLSearchParams;
  timeoutMs: number;
}

export const withQuery = (url: string, query: HttpRequestOptions['query'] = {}): string => {
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) target.searchParams.set(key, String(value));
  }
  return target.toString();
};

const send = async (fetchImpl: FetchLike, url: string, options: HttpRequestOptions) => {
  const target = withQuery(url, options.query);
  const response = await fetchImpl(target, {
    method: options.method ?? 'GET',
    headers: options.headers,
    body: options.body,
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  if (!response.ok) {
    throw new HttpError(response.status, target, await response.text().catch(() => ''));
  }
  return response;
};

export const requestJson = async (fetchImpl: FetchLike, url: string, options: HttpRequestOptions): Promise<unknown> => {
  const response = await send(fetchImpl, url, options);
  return response.json();
};

export const requestText = async (fetchImpl: FetchLike, url: string, options: HttpRequestOptions): Promise<string> => {
  const response = await send(fetchImpl, url, options);
  return response.text();
};
