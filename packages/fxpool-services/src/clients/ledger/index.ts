export type {
  BalanceReader,
  BalanceLedger,
  LedgerTransaction,
  SwapRequest,
  JoinRequest,
  ExitRequest,
  JoinResult,
  ExitResult,
} from './balance-ledger.js';
export {
  InMemoryBalanceLedger,
  fixedRateSwapQuoter,
  type SwapQuoter,
  type SwapQuoteRequest,
  type TokenRate,
} from './in-memory-balance-ledger.js';
export {
  VaultBalanceReader,
  vaultAbi,
  poolShareAbi,
  type VaultReadClient,
} from './vault-balance-reader.js';
