/**
 * Status Reporter Module
 */

export {
  type ProgressSnapshot,
  SnapshotFormatOptionsSchema,
  type SnapshotFormatOptions,
} from './types.js';

export { report, formatProgressSnapshot } from './status-reporter.js';
