export type { RateOracle } from './rate-oracle.js';
export {
  ChainlinkRateOracle,
  aggregatorV3Abi,
  type OracleReadClient,
} from './chainlink-rate-oracle.js';
