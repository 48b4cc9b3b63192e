import type { Browser, BrowserContext, ElementHandle, Page } from 'playwright';
import type { DomNode } from './dom';
import { NavigationError, errorMessage } from './errors';
import { DESKTOP_USER_AGENT } from '../utils/http';
import type { ProxySettings } from '../utils/proxy';

export interface BrowserSession {
  open(baseUrl: string): Promise<void>;
  navigate(url: string, timeoutMs?: number): Promise<void>;
  waitForStable(timeoutMs?: number): Promise<void>;
  root(): Promise<DomNode>;
  query(selectors: readonly string[]): Promise<DomNode | null>;
  click(node: DomNode): Promise<void>;
  selectOption(node: DomNode, value: string): Promise<boolean>;
  fill(node: DomNode, value: string): Promise<void>;
  currentUrl(): string;
  close(): Promise<void>;
}

export type PlaywrightSessionOptions = {
  headless: boolean;
  navigationTimeoutMs: number;
  stableTimeoutMs: number;
  actionTimeoutMs?: number;
  proxy?: ProxySettings | null;
};

class LiveNode implements DomNode {
  constructor(readonly handle: ElementHandle) {}

  async query(selector: string): Promise<DomNode | null> {
    const found = await this.handle.$(selector);
    return found ? new LiveNode(found) : null;
  }

  async queryAll(selector: string): Promise<DomNode[]> {
    const found = await this.handle.$$(selector);
    return found.map((el) => new LiveNode(el));
  }

  async text(): Promise<string> {
    return (await this.handle.textContent()) ?? '';
  }

  async attr(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async tagName(): Promise<string> {
    return this.handle.evaluate((el) => el.nodeName.toLowerCase());
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}

export class PlaywrightBrowserSession implements BrowserSession {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(private readonly options: PlaywrightSessionOptions) {}

  async open(baseUrl: string): Promise<void> {
    const { chromium } = await import('playwright');

    this.browser = await chromium.launch({
      headless: this.options.headless,
      proxy: this.options.proxy ?? undefined,
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-blink-features=AutomationControlled'],
    });

    this.context = await this.browser.newContext({
      userAgent: DESKTOP_USER_AGENT,
      viewport: { width: 1920, height: 1080 },
      locale: 'en-US',
    });

    this.page = await this.context.newPage();
    console.log(`[Browser] Launched Chromium (headless: ${this.options.headless})`);
    await this.navigate(baseUrl);
  }

  async navigate(url: string, timeoutMs: number = this.options.navigationTimeoutMs): Promise<void> {
    const page = this.requirePage();
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    } catch (err) {
      throw new NavigationError(url, timeoutMs, { cause: err });
    }
  }

  async waitForStable(timeoutMs: number = this.options.stableTimeoutMs): Promise<void> {
    const page = this.requirePage();
    try {
      await page.waitForLoadState('networkidle', { timeout: timeoutMs });
    } catch (err) {
      if (!isTimeout(err)) throw err;
      console.log(`[Browser] Network still busy after ${timeoutMs}ms on ${page.url()}, continuing`);
    }
  }

  async root(): Promise<DomNode> {
    const html = await this.requirePage().$('html');
    if (!html) throw new Error('Page has no document element');
    return new LiveNode(html);
  }

  async query(selectors: readonly string[]): Promise<DomNode | null> {
    const page = this.requirePage();
    for (const selector of selectors) {
      try {
        const found = await page.$(selector);
        if (found) return new LiveNode(found);
      } catch (err) {
        console.warn(`[Browser] Selector "${selector}" failed: ${errorMessage(err)}`);
      }
    }
    return null;
  }

  async click(node: DomNode): Promise<void> {
    await this.handleOf(node).click({ timeout: this.actionTimeout() });
  }

  async selectOption(node: DomNode, value: string): Promise<boolean> {
    const handle = this.handleOf(node);
    const wanted = value.trim().toLowerCase();

    for (const option of await handle.$$('option')) {
      const optionValue = (await option.getAttribute('value')) ?? '';
      const label = ((await option.textContent()) ?? '').trim();
      if (optionValue.trim().toLowerCase() === wanted || label.toLowerCase() === wanted) {
        await handle.selectOption({ value: optionValue }, { timeout: this.actionTimeout() });
        return true;
      }
    }
    return false;
  }

  async fill(node: DomNode, value: string): Promise<void> {
    await this.handleOf(node).fill(value, { timeout: this.actionTimeout() });
  }

  currentUrl(): string {
    return this.requirePage().url();
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.page = null;
    this.context = null;
    this.browser = null;
    if (!browser) return;

    try {
      await browser.close();
      console.log('[Browser] Closed');
    } catch (err) {
      console.warn(`[Browser] Close failed: ${errorMessage(err)}`);
    }
  }

  private requirePage(): Page {
    if (!this.page) throw new Error('Browser session is not open');
    return this.page;
  }

  private handleOf(node: DomNode): ElementHandle {
    if (!(node instanceof LiveNode)) throw new Error('Element does not belong to this browser session');
    return node.handle;
  }

  private actionTimeout(): number {
    return this.options.actionTimeoutMs ?? 5000;
  }
}

/**
 * Opens the session, runs `fn`, and closes the session on every exit path.
 * Aborting the signal closes the session straight away so pending browser
 * calls reject instead of running out their timeouts.
 */
export async function withBrowserSession<T>(
  session: BrowserSession,
  baseUrl: string,
  fn: (session: BrowserSession) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  const onAbort = () => {
    console.log('[Browser] Run cancelled, closing session');
    session.close().catch((err) => console.warn(`[Browser] Close after cancel failed: ${errorMessage(err)}`));
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    signal?.throwIfAborted();
    await session.open(baseUrl);
    return await fn(session);
  } finally {
    signal?.removeEventListener('abort', onAbort);
    await session.close();
  }
}
