export {
  CurveLiquidityService,
  type CurveLiquidityServiceDependencies,
} from './curve-liquidity-service.js';
