export { assimilatorFor, type FxPool } from './fx-pool.js';
export { PoolDirectory } from './pool-directory.js';
export {
  poolParametersSchema,
  curveParametersSchema,
  weightedPairSchema,
  fxTokenSchema,
  addressSchema,
  hex32Schema,
  type PoolParameters,
} from './pool-parameters.js';
export {
  PoolDeploymentService,
  type PoolDeploymentServiceDependencies,
} from './pool-deployment-service.js';
