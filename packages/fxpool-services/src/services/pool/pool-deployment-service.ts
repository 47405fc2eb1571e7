/**
 * Pool Deployment Service
 *
 * Onboards an FX pool: validates its parameters, wires the base and quote
 * assimilators through the registry, records the base template for the
 * pool and registers it in the pool directory.
 */

import {
  InputError,
  ZERO_ADDRESS,
  sameAddress,
  type FxPoolConfig,
} from '@fxpool/shared';
import { createServiceLogger, log, type ServiceLogger } from '../../logging/index.js';
import {
  BASE_TO_USD_TEMPLATE,
  USD_QUOTE_TEMPLATE,
  type AssimilatorRegistry,
} from '../assimilator/index.js';
import type { FxPool } from './fx-pool.js';
import { PoolDirectory } from './pool-directory.js';
import { poolParametersSchema } from './pool-parameters.js';

export interface PoolDeploymentServiceDependencies {
  registry: AssimilatorRegistry;
  directory?: PoolDirectory;
}

export class PoolDeploymentService {
  readonly directory: PoolDirectory;
  private readonly registry: AssimilatorRegistry;
  private readonly logger: ServiceLogger;

  constructor(dependencies: PoolDeploymentServiceDependencies) {
    this.registry = dependencies.registry;
    this.directory = dependencies.directory ?? new PoolDirectory();
    this.logger = createServiceLogger('PoolDeploymentService');
  }

  /**
   * @throws InputError InvalidPoolParameters listing every failed field
   * @throws InputError ZeroAddress
   */
  validatePoolParameters(input: unknown): FxPoolConfig {
    const result = poolParametersSchema.safeParse(input);

    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new InputError(
        'InvalidPoolParameters',
        `Invalid pool parameters: ${issues.join('; ')}`,
        { issues }
      );
    }

    const config = result.data;
    const addresses = {
      poolAddress: config.poolAddress,
      baseToken: config.baseToken.address,
      quoteToken: config.quoteToken.address,
      baseOracle: config.baseOracle,
    };
    for (const [field, address] of Object.entries(addresses)) {
      if (sameAddress(address, ZERO_ADDRESS)) {
        throw new InputError('ZeroAddress', `${field} cannot be the zero address`, { field });
      }
    }

    return config;
  }

  onboardPool(input: unknown): FxPool {
    const config = this.validatePoolParameters(input);
    const { poolId, baseToken, quoteToken, baseOracle } = config;

    log.methodEntry(this.logger, 'onboardPool', {
      poolId,
      baseToken: baseToken.symbol,
      quoteToken: quoteToken.symbol,
    });

    if (this.directory.has(poolId)) {
      throw new InputError('InvalidPoolParameters', `Pool ${poolId} is already onboarded`, {
        poolId,
      });
    }

    const base = this.registry.getOrCreate({
      token: baseToken,
      oracle: baseOracle,
      template: BASE_TO_USD_TEMPLATE,
    });
    const quote = this.registry.getOrCreate({
      token: quoteToken,
      oracle: ZERO_ADDRESS,
      template: USD_QUOTE_TEMPLATE,
    });

    this.registry.recordPoolTemplate(poolId, BASE_TO_USD_TEMPLATE);

    const pool: FxPool = { config, base, quote };
    this.directory.register(pool);

    this.logger.info({ poolId, msg: 'FX pool onboarded' });
    log.methodExit(this.logger, 'onboardPool', { poolId });
    return pool;
  }
}
