/**
 * Extraction Types
 *
 * The Extraction Operation is the orchestrator's only collaborator for
 * real work: given one identifier it returns an outcome. Implementations
 * must not carry mutable state between calls.
 */

import { z } from 'zod';

export interface ExtractionResult {
  status: 'succeeded' | 'failed';
  payload: Record<string, unknown> | null;
  error: string | null;
}

export interface ExtractionOperation {
  /**
   * Extract one identifier. Should report failures through the result
   * rather than throw. `signal` is aborted when the per-item timeout
   * fires; the returned promise must then settle promptly, after every
   * resource the call acquired has been released.
   */
  extract(id: string, signal?: AbortSignal): Promise<ExtractionResult>;
}

export function succeeded(payload: Record<string, unknown>): ExtractionResult {
  return { status: 'succeeded', payload, error: null };
}

export function failed(error: string, payload: Record<string, unknown> | null = null): ExtractionResult {
  return { status: 'failed', payload, error };
}

// =============================================================================
// Page Sessions
// =============================================================================

/**
 * One browser page, owned by a single extraction call
 */
export interface PageSession {
  goto(url: string, timeoutMs: number): Promise<void>;
  /** Resolves false when the selector did not appear in time */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  title(): Promise<string>;
  content(): Promise<string>;
  /**
   * Trimmed text of the first match, waiting up to `timeoutMs` (0 = no
   * wait). Empty string when nothing matches.
   */
  textOf(selector: string, timeoutMs: number): Promise<string>;
  /** Release the page and the browser behind it */
  close(): Promise<void>;
}

export interface PageSessionFactory {
  open(): Promise<PageSession>;
}

// =============================================================================
// Page Extractor Configuration
// =============================================================================

export const PageSelectorsSchema = z.object({
  title: z.string().min(1).default('h1.dictionary-detail-title'),
  subtitle: z.string().min(1).default('h2.dictionary-detail-title'),
  content: z.string().min(1).default('div.dictionary-details'),
});
export type PageSelectors = z.infer<typeof PageSelectorsSchema>;

export const PageExtractorConfigSchema = z.object({
  selectors: PageSelectorsSchema.default({}),
  navigationTimeoutMs: z.number().int().positive().default(60000),
  bodyTimeoutMs: z.number().int().positive().default(15000),
  selectorTimeoutMs: z.number().int().nonnegative().default(10000),
  challengeTimeoutMs: z.number().int().nonnegative().default(30000),
  challengePollMs: z.number().int().positive().default(3000),
});
export type PageExtractorConfig = z.infer<typeof PageExtractorConfigSchema>;
export type PageExtractorOptions = z.input<typeof PageExtractorConfigSchema>;

/**
 * Phrases shown by anti-bot interstitials while they check the client
 */
export const CHALLENGE_PHRASES: readonly string[] = [
  'just a moment',
  'checking your browser',
  'please enable cookies',
  'attention required',
  'verify you are human',
  'enable javascript',
];
