export { ledgerEvents } from './ledger-events';
