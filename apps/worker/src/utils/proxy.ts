// Proxy settings for the browser session, taken from --proxy or PROXY_URL

export type ProxySettings = {
  server: string;
  username?: string;
  password?: string;
};

export function parseProxyUrl(proxyUrl: string | undefined): ProxySettings | null {
  if (!proxyUrl) return null;

  try {
    const parsed = new URL(proxyUrl);
    const port = parsed.port ? `:${parsed.port}` : '';
    const result: ProxySettings = { server: `${parsed.protocol}//${parsed.hostname}${port}` };
    if (parsed.username) result.username = decodeURIComponent(parsed.username);
    if (parsed.password) result.password = decodeURIComponent(parsed.password);
    return result;
  } catch {
    console.error(`[Proxy] Invalid proxy URL format: ${proxyUrl}`);
    return null;
  }
}
