/**
 * Balance Ledger
 *
 * External collaborator that owns pool balances, share supply and token
 * custody. The engine only reads from it and stages effects through a
 * LedgerTransaction that is committed after post-conditions pass.
 *
 * Token order everywhere is the ledger's canonical order (ascending address).
 */

import type { Hex32, HexAddress, LedgerPoolTokens } from '@fxpool/shared';

/**
 * Read-only view of the ledger
 */
export interface BalanceReader {
  getPoolTokens(poolId: Hex32): Promise<LedgerPoolTokens>;
  getTotalSupply(poolId: Hex32): Promise<bigint>;
  getShareBalance(poolId: Hex32, account: HexAddress): Promise<bigint>;
  /**
   * Output of swapping `amountIn` of tokenIn for tokenOut, without executing
   */
  simulateSwap(
    poolId: Hex32,
    tokenIn: HexAddress,
    tokenOut: HexAddress,
    amountIn: bigint
  ): Promise<bigint>;
}

export interface SwapRequest {
  poolId: Hex32;
  account: HexAddress;
  tokenIn: HexAddress;
  tokenOut: HexAddress;
  amountIn: bigint;
  /** Ledger rejects the swap below this output */
  minAmountOut: bigint;
}

export interface JoinRequest {
  poolId: Hex32;
  account: HexAddress;
  /** Amounts taken from the account, canonical order */
  amountsIn: readonly bigint[];
  /** Ledger rejects the join above these amounts, canonical order */
  maxAmountsIn: readonly bigint[];
  sharesOut: bigint;
}

export interface ExitRequest {
  poolId: Hex32;
  account: HexAddress;
  sharesIn: bigint;
  /** Amounts released to the account, canonical order */
  amountsOut: readonly bigint[];
  /** Ledger rejects the exit below these amounts, canonical order */
  minAmountsOut: readonly bigint[];
}

export interface JoinResult {
  amountsIn: bigint[];
  sharesMinted: bigint;
}

export interface ExitResult {
  amountsOut: bigint[];
  sharesBurned: bigint;
}

/**
 * Staged, all-or-nothing unit of work
 *
 * Reads through the transaction observe its own staged effects. Nothing is
 * visible outside the transaction until commit(); rollback() discards it.
 */
export interface LedgerTransaction extends BalanceReader {
  executeSwap(request: SwapRequest): Promise<bigint>;
  join(request: JoinRequest): Promise<JoinResult>;
  exit(request: ExitRequest): Promise<ExitResult>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/**
 * Ledger that supports staged mutations
 */
export interface BalanceLedger extends BalanceReader {
  begin(): Promise<LedgerTransaction>;
}
