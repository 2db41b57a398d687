export type { ResourceLedger } from './resource-ledger';
export { canAfford, deductAll, formatCost, missingResources } from './resource-ledger';
