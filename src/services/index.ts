export { runReconciliation, reconciliationService } from './reconciliation.service';
export type { ReconciliationDeps } from './reconciliation.service';
