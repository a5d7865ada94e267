/**
 * Page Extractor
 *
 * Extraction Operation for dictionary-style detail pages. Every call opens
 * a fresh browser session, navigates, waits out an anti-bot interstitial,
 * reads three text regions and closes the session again.
 */

import { Logger, createSilentLogger } from '../logging/index.js';
import {
  type ExtractionOperation,
  type ExtractionResult,
  type PageExtractorConfig,
  type PageExtractorOptions,
  type PageSession,
  type PageSessionFactory,
  CHALLENGE_PHRASES,
  PageExtractorConfigSchema,
  failed,
  succeeded,
} from './types.js';

export interface PageFields {
  title: string;
  subtitle: string;
  content: string;
}

/**
 * Whether a page title or body still shows a challenge interstitial
 */
export function isChallengePage(title: string, html: string): boolean {
  const haystack = `${title}\n${html}`.toLowerCase();
  return CHALLENGE_PHRASES.some((phrase) => haystack.includes(phrase));
}

/**
 * A page counts as extracted when any of its text regions is non-empty
 */
export function toExtractionResult(url: string, fields: PageFields): ExtractionResult {
  const payload = { url, ...fields };
  if (fields.title || fields.subtitle || fields.content) {
    return succeeded(payload);
  }
  return failed('Empty content', payload);
}

export class PageExtractor implements ExtractionOperation {
  private readonly config: PageExtractorConfig;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly sessions: PageSessionFactory,
    options?: PageExtractorOptions & {
      logger?: Logger;
      sleep?: (ms: number) => Promise<void>;
    }
  ) {
    const { logger, sleep, ...rest } = options ?? {};
    this.config = PageExtractorConfigSchema.parse(rest);
    this.logger = logger ?? createSilentLogger();
    this.sleep = sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Aborting `signal` closes the open session, so whatever page call is in
   * flight rejects and the result settles as failed.
   */
  async extract(url: string, signal?: AbortSignal): Promise<ExtractionResult> {
    let session: PageSession | undefined;
    let closing: Promise<void> | undefined;

    const closeSession = (): Promise<void> => {
      if (!session) return Promise.resolve();
      if (!closing) {
        closing = session.close().catch((error: unknown) => {
          this.logger.warn('Could not close page session', {
            url,
            error: error instanceof Error ? error.message : String(error),
          });
        });
      }
      return closing;
    };
    const onAbort = (): void => {
      void closeSession();
    };

    try {
      signal?.throwIfAborted();
      session = await this.sessions.open();
      signal?.addEventListener('abort', onAbort, { once: true });
      signal?.throwIfAborted();

      await session.goto(url, this.config.navigationTimeoutMs);
      if (!(await session.waitForSelector('body', this.config.bodyTimeoutMs))) {
        return failed('Page body did not load');
      }

      if (!(await this.waitForChallengeToClear(session, url, signal))) {
        return failed('Challenge page did not clear');
      }

      const { selectors, selectorTimeoutMs } = this.config;
      const fields: PageFields = {
        title: await session.textOf(selectors.title, selectorTimeoutMs),
        subtitle: await session.textOf(selectors.subtitle, 0),
        content: await session.textOf(selectors.content, selectorTimeoutMs),
      };
      signal?.throwIfAborted();

      return toExtractionResult(url, fields);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug('Extraction failed', { url, error: message });
      return failed(message);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await closeSession();
    }
  }

  private async waitForChallengeToClear(
    session: PageSession,
    url: string,
    signal: AbortSignal | undefined
  ): Promise<boolean> {
    const maxPolls = Math.ceil(this.config.challengeTimeoutMs / this.config.challengePollMs);

    for (let poll = 0; ; poll++) {
      signal?.throwIfAborted();
      const [title, html] = await Promise.all([
        session.title().catch(() => ''),
        session.content().catch(() => ''),
      ]);

      if (!isChallengePage(title, html)) {
        return true;
      }
      if (poll >= maxPolls) {
        this.logger.warn('Challenge page timeout', { url });
        return false;
      }

      this.logger.debug('Challenge page detected, waiting', { url });
      await this.sleep(this.config.challengePollMs);
    }
  }
}
