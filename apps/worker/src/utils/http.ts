import axios from 'axios';

export type HttpResponse = {
  status: number;
  url: string;
  body: string;
};

export type HttpGet = (url: string) => Promise<HttpResponse>;

export const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Every status resolves; RetryPolicy decides what counts as a failure
export function createHttpGet(timeoutMs: number): HttpGet {
  const client = axios.create({
    timeout: timeoutMs,
    responseType: 'text',
    maxRedirects: 5,
    validateStatus: () => true,
    headers: {
      'User-Agent': DESKTOP_USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
    },
  });

  return async (url) => {
    const response = await client.get<string>(url);
    const finalUrl: unknown = response.request?.res?.responseUrl;
    return {
      status: response.status,
      url: typeof finalUrl === 'string' ? finalUrl : url,
      body: typeof response.data === 'string' ? response.data : String(response.data),
    };
  };
}
