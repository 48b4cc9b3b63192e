import { PlaywrightBrowserSession, withBrowserSession } from '../scrapers/browser-session';
import { BASE_URL, FakeBrowserSession, silenceConsole } from './test-helpers';

describe('withBrowserSession', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  it('should open, run and close', async () => {
    const session = new FakeBrowserSession();

    const result = await withBrowserSession(session, BASE_URL, async (s) => s.currentUrl());

    expect(result).toBe(BASE_URL);
    expect(session.opened).toBe(true);
    expect(session.closeCount).toBe(1);
  });

  it('should close when the callback throws', async () => {
    const session = new FakeBrowserSession();

    await expect(
      withBrowserSession(session, BASE_URL, async () => {
        throw new Error('page crashed');
      }),
    ).rejects.toThrow('page crashed');
    expect(session.closeCount).toBe(1);
  });

  it('should close the session as soon as the run is cancelled', async () => {
    const session = new FakeBrowserSession();
    const controller = new AbortController();

    await expect(
      withBrowserSession(
        session,
        BASE_URL,
        async (s) => {
          controller.abort();
          return s.root();
        },
        controller.signal,
      ),
    ).rejects.toThrow('Browser session is not open');
    expect(session.closeCount).toBe(2);
  });
});

describe('PlaywrightBrowserSession', () => {
  it('should allow close before open', async () => {
    const session = new PlaywrightBrowserSession({ headless: true, navigationTimeoutMs: 1000, stableTimeoutMs: 1000 });
    await expect(session.close()).resolves.toBeUndefined();
    await expect(session.close()).resolves.toBeUndefined();
  });

  it('should refuse page work before open', async () => {
    const session = new PlaywrightBrowserSession({ headless: true, navigationTimeoutMs: 1000, stableTimeoutMs: 1000 });
    await expect(session.navigate(BASE_URL)).rejects.toThrow('Browser session is not open');
    expect(() => session.currentUrl()).toThrow('Browser session is not open');
  });
});
