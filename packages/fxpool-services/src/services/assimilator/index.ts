export {
  FxAssimilator,
  type Assimilator,
  type LpRatioContext,
  type RateSource,
} from './assimilator.js';
export {
  BaseAssimilator,
  systemClock,
  type BaseAssimilatorOptions,
  type Clock,
} from './base-assimilator.js';
export { QuoteAssimilator } from './quote-assimilator.js';
export {
  AssimilatorRegistry,
  assimilatorKey,
  BASE_TO_USD_TEMPLATE,
  USD_QUOTE_TEMPLATE,
  type AssimilatorRequest,
  type AssimilatorTemplate,
  type AssimilatorRegistryDependencies,
} from './assimilator-registry.js';
