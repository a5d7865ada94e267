/**
 * Work Ledger Module
 */

export {
  type WorkItem,
  LedgerErrorCode,
  LedgerError,
  isLedgerError,
} from './types.js';

export { WorkLedger, loadWorkLedger, isErrnoException } from './ledger.js';
