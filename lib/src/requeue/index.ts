export { collectFailedIdentifiers, writeLedgerFile } from './requeue.js';
