/**
 * Extraction Module
 */

export {
  type ExtractionResult,
  type ExtractionOperation,
  succeeded,
  failed,
  type PageSession,
  type PageSessionFactory,
  PageSelectorsSchema,
  type PageSelectors,
  PageExtractorConfigSchema,
  type PageExtractorConfig,
  type PageExtractorOptions,
  CHALLENGE_PHRASES,
} from './types.js';

export {
  PageExtractor,
  type PageFields,
  isChallengePage,
  toExtractionResult,
} from './page-extractor.js';

export {
  createPlaywrightSessionFactory,
  type PlaywrightSessionOptions,
} from './playwright-session.js';
