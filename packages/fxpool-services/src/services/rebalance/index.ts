export {
  RebalanceService,
  type RebalanceServiceDependencies,
  type PricedRebalance,
} from './rebalance-service.js';
