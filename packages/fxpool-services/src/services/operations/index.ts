export {
  FxPoolOperationsService,
  type FxPoolOperationsServiceDependencies,
  type MigrationRequest,
  type RebalancedDepositRequest,
} from './fx-pool-operations-service.js';
