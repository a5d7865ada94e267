/**
 * Playwright-backed page sessions
 *
 * Each `open()` launches its own headless Chromium, so nothing (cookies,
 * cache, fingerprint state) survives from one identifier to the next.
 */

import { chromium, errors, type Browser, type Page } from 'playwright-core';
import type { PageSession, PageSessionFactory } from './types.js';

export interface PlaywrightSessionOptions {
  /** Chromium/Chrome binary; falls back to the playwright-core registry */
  executablePath?: string;
  headless?: boolean;
  userAgent?: string;
  locale?: string;
  /** Abort image requests */
  blockImages?: boolean;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36';

const LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-dev-shm-usage',
  '--no-sandbox',
  '--disable-gpu',
  '--disable-extensions',
];

// Mask navigator.webdriver to avoid detection
const STEALTH_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
window.chrome = { runtime: {} };
`;

class PlaywrightPageSession implements PageSession {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page
  ) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  title(): Promise<string> {
    return this.page.title();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async textOf(selector: string, timeoutMs: number): Promise<string> {
    if (timeoutMs > 0 && !(await this.waitForSelector(selector, timeoutMs))) {
      return '';
    }
    const element = await this.page.$(selector);
    if (!element) {
      return '';
    }
    return (await element.innerText()).trim();
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export function createPlaywrightSessionFactory(
  options: PlaywrightSessionOptions = {}
): PageSessionFactory {
  return {
    async open(): Promise<PageSession> {
      const browser = await chromium.launch({
        headless: options.headless ?? true,
        executablePath: options.executablePath,
        args: LAUNCH_ARGS,
      });

      try {
        const context = await browser.newContext({
          userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
          locale: options.locale ?? 'en-US',
          viewport: { width: 1920, height: 1080 },
        });
        await context.addInitScript({ content: STEALTH_SCRIPT });

        if (options.blockImages ?? true) {
          await context.route('**/*', (route) =>
            route.request().resourceType() === 'image' ? route.abort() : route.continue()
          );
        }

        const page = await context.newPage();
        return new PlaywrightPageSession(browser, page);
      } catch (error) {
        await browser.close();
        throw error;
      }
    },
  };
}
