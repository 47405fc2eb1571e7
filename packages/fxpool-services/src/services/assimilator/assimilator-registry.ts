/**
 * Assimilator Registry
 *
 * Write-once map from keccak256(abi.encode(token, oracle, template)) to the
 * single assimilator instance for that triple, plus a write-once record of
 * which base template each pool was onboarded with.
 */

import { encodeAbiParameters, keccak256, parseAbiParameters, stringToHex } from 'viem';
import {
  InputError,
  InvariantViolation,
  OracleError,
  ZERO_ADDRESS,
  sameAddress,
  type FxToken,
  type Hex32,
  type HexAddress,
} from '@fxpool/shared';
import type { RateOracle } from '../../clients/oracle/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { Assimilator } from './assimilator.js';
import { BaseAssimilator, type Clock } from './base-assimilator.js';
import { QuoteAssimilator } from './quote-assimilator.js';

export interface AssimilatorTemplate {
  name: string;
  kind: 'oracle' | 'fixed';
  /** keccak256 of the template name */
  id: Hex32;
}

function defineTemplate(name: string, kind: AssimilatorTemplate['kind']): AssimilatorTemplate {
  return { name, kind, id: keccak256(stringToHex(name)) };
}

/** Oracle-priced base token */
export const BASE_TO_USD_TEMPLATE = defineTemplate('BaseToUsdAssimilator', 'oracle');

/** USD-pegged quote token at a fixed 1.0 */
export const USD_QUOTE_TEMPLATE = defineTemplate('UsdQuoteAssimilator', 'fixed');

export interface AssimilatorRequest {
  token: FxToken;
  /** Rate oracle address; ZERO_ADDRESS for fixed-rate templates */
  oracle: HexAddress;
  template: AssimilatorTemplate;
}

export interface AssimilatorRegistryDependencies {
  /**
   * Oracle client for an aggregator address
   * Required to create oracle-priced assimilators
   */
  oracleFor?: (address: HexAddress) => RateOracle;

  stalenessSeconds?: bigint;
  now?: Clock;
}

const keyParameters = parseAbiParameters('address token, address oracle, bytes32 template');

/**
 * Composite registry key for a (token, oracle, template) triple
 */
export function assimilatorKey(token: HexAddress, oracle: HexAddress, template: Hex32): Hex32 {
  return keccak256(encodeAbiParameters(keyParameters, [token, oracle, template]));
}

export class AssimilatorRegistry {
  private readonly assimilators = new Map<Hex32, Assimilator>();
  private readonly poolTemplates = new Map<string, AssimilatorTemplate>();
  private readonly oracleFor?: (address: HexAddress) => RateOracle;
  private readonly stalenessSeconds?: bigint;
  private readonly now?: Clock;
  private readonly logger = createServiceLogger('AssimilatorRegistry');

  constructor(dependencies: AssimilatorRegistryDependencies = {}) {
    this.oracleFor = dependencies.oracleFor;
    this.stalenessSeconds = dependencies.stalenessSeconds;
    this.now = dependencies.now;
  }

  keyOf(request: AssimilatorRequest): Hex32 {
    return assimilatorKey(request.token.address, request.oracle, request.template.id);
  }

  get(key: Hex32): Assimilator | undefined {
    return this.assimilators.get(key);
  }

  /**
   * Create the assimilator for a triple
   *
   * @throws InvariantViolation AssimilatorAlreadyRegistered when the triple exists
   */
  create(request: AssimilatorRequest): Assimilator {
    const key = this.keyOf(request);
    if (this.assimilators.has(key)) {
      throw new InvariantViolation(
        'AssimilatorAlreadyRegistered',
        `Assimilator for ${request.token.symbol} (${request.template.name}) already exists`,
        { key, token: request.token.address, oracle: request.oracle }
      );
    }

    const assimilator = this.build(request);
    this.assimilators.set(key, assimilator);

    this.logger.info({
      key,
      token: request.token.address,
      oracle: request.oracle,
      template: request.template.name,
      msg: 'Assimilator created',
    });

    return assimilator;
  }

  /**
   * Existing assimilator for the triple, or a newly created one
   */
  getOrCreate(request: AssimilatorRequest): Assimilator {
    return this.assimilators.get(this.keyOf(request)) ?? this.create(request);
  }

  /**
   * @throws InvariantViolation TemplateAlreadyRecorded on a second write
   */
  recordPoolTemplate(poolId: Hex32, template: AssimilatorTemplate): void {
    const key = poolId.toLowerCase();
    const existing = this.poolTemplates.get(key);
    if (existing) {
      throw new InvariantViolation(
        'TemplateAlreadyRecorded',
        `Pool ${poolId} already records template ${existing.name}`,
        { poolId, template: existing.name }
      );
    }
    this.poolTemplates.set(key, template);
  }

  getPoolTemplate(poolId: Hex32): AssimilatorTemplate | undefined {
    return this.poolTemplates.get(poolId.toLowerCase());
  }

  private build(request: AssimilatorRequest): Assimilator {
    const { token, oracle, template } = request;

    if (sameAddress(token.address, ZERO_ADDRESS)) {
      throw new InputError('ZeroAddress', 'Assimilator token cannot be the zero address');
    }

    if (template.kind === 'fixed') {
      return new QuoteAssimilator(token);
    }

    if (sameAddress(oracle, ZERO_ADDRESS)) {
      throw new InputError('ZeroAddress', `Oracle for ${token.symbol} cannot be the zero address`);
    }
    if (!this.oracleFor) {
      const error = new OracleError(
        'OracleClientUnavailable',
        'AssimilatorRegistry has no oracle client factory',
        { oracle }
      );
      log.methodError(this.logger, 'create', error, { token: token.address });
      throw error;
    }

    return new BaseAssimilator(token, this.oracleFor(oracle), oracle, {
      stalenessSeconds: this.stalenessSeconds,
      now: this.now,
    });
  }
}
