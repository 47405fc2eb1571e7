/**
 * In-Memory Balance Ledger
 *
 * In-process stand-in for the vault: pool balances, share supply, share
 * holdings and account token balances live in maps. Transactions record
 * deltas against the committed state and apply them on commit.
 *
 * Used for local simulation and tests; swap pricing is pluggable.
 */

import {
  LedgerError,
  convertDecimals,
  validateBps,
  BPS_DENOMINATOR,
  type Hex32,
  type HexAddress,
  type LedgerPoolTokens,
} from '@fxpool/shared';
import { createServiceLogger } from '../../logging/index.js';
import type {
  BalanceLedger,
  BalanceReader,
  ExitRequest,
  ExitResult,
  JoinRequest,
  JoinResult,
  LedgerTransaction,
  SwapRequest,
} from './balance-ledger.js';

const log = createServiceLogger('InMemoryBalanceLedger');

// =============================================================================
// Swap pricing
// =============================================================================

export interface SwapQuoteRequest {
  tokenIn: HexAddress;
  tokenOut: HexAddress;
  amountIn: bigint;
  /** Pool state the swap is priced against */
  pool: LedgerPoolTokens;
}

export type SwapQuoter = (request: SwapQuoteRequest) => bigint;

export interface TokenRate {
  /** USD value of one whole token, scaled by 1e8 */
  rate: bigint;
  decimals: number;
}

/**
 * Prices swaps at fixed USD rates, less a flat fee
 */
export function fixedRateSwapQuoter(
  rates: Iterable<readonly [HexAddress, TokenRate]>,
  feeBps: number = 0
): SwapQuoter {
  const byToken = new Map<string, TokenRate>();
  for (const [token, rate] of rates) {
    byToken.set(token.toLowerCase(), rate);
  }
  const fee = validateBps(feeBps, 'feeBps');

  return ({ tokenIn, tokenOut, amountIn }) => {
    const rateIn = byToken.get(tokenIn.toLowerCase());
    const rateOut = byToken.get(tokenOut.toLowerCase());
    if (!rateIn || !rateOut) {
      throw new LedgerError('No rate configured for swap pair', { tokenIn, tokenOut });
    }
    const gross =
      convertDecimals(amountIn * rateIn.rate, rateIn.decimals, rateOut.decimals) / rateOut.rate;
    return (gross * (BPS_DENOMINATOR - fee)) / BPS_DENOMINATOR;
  };
}

// =============================================================================
// State
// =============================================================================

interface PoolRecord {
  poolId: Hex32;
  /** Ascending address order */
  tokens: HexAddress[];
  balances: bigint[];
  totalSupply: bigint;
  shares: Map<string, bigint>;
}

interface LedgerStore {
  pools: Map<string, PoolRecord>;
  wallets: Map<string, bigint>;
}

const storeKey = (...parts: string[]): string =>
  parts.map((part) => part.toLowerCase()).join(':');

function indexOfToken(tokens: readonly HexAddress[], token: HexAddress): number {
  return tokens.findIndex((candidate) => candidate.toLowerCase() === token.toLowerCase());
}

function compareAddresses(a: HexAddress, b: HexAddress): number {
  const left = BigInt(a);
  const right = BigInt(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Reads shared by the ledger (committed state) and its transactions
 * (committed state plus staged deltas)
 */
abstract class LedgerView implements BalanceReader {
  constructor(
    protected readonly store: LedgerStore,
    protected readonly quoter: SwapQuoter
  ) {}

  protected balancesOf(pool: PoolRecord): bigint[] {
    return [...pool.balances];
  }

  protected supplyOf(pool: PoolRecord): bigint {
    return pool.totalSupply;
  }

  protected sharesOf(pool: PoolRecord, account: HexAddress): bigint {
    return pool.shares.get(account.toLowerCase()) ?? 0n;
  }

  protected walletOf(account: HexAddress, token: HexAddress): bigint {
    return this.store.wallets.get(storeKey(account, token)) ?? 0n;
  }

  protected pool(poolId: Hex32): PoolRecord {
    const pool = this.store.pools.get(poolId.toLowerCase());
    if (!pool) {
      throw new LedgerError(`Pool ${poolId} is not registered with the ledger`, { poolId });
    }
    return pool;
  }

  protected quote(
    poolId: Hex32,
    tokenIn: HexAddress,
    tokenOut: HexAddress,
    amountIn: bigint
  ): { amountOut: bigint; inIndex: number; outIndex: number } {
    if (amountIn <= 0n) {
      throw new LedgerError('Swap amount must be positive', { amountIn: amountIn.toString() });
    }

    const pool = this.pool(poolId);
    const inIndex = indexOfToken(pool.tokens, tokenIn);
    const outIndex = indexOfToken(pool.tokens, tokenOut);
    if (inIndex < 0 || outIndex < 0 || inIndex === outIndex) {
      throw new LedgerError('Swap pair is not traded by this pool', { poolId, tokenIn, tokenOut });
    }

    const balances = this.balancesOf(pool);
    const amountOut = this.quoter({
      tokenIn,
      tokenOut,
      amountIn,
      pool: { tokens: [...pool.tokens], balances },
    });

    if (amountOut > balances[outIndex]) {
      throw new LedgerError('Swap output exceeds pool balance', {
        poolId,
        amountOut: amountOut.toString(),
        balance: balances[outIndex].toString(),
      });
    }

    return { amountOut, inIndex, outIndex };
  }

  async getPoolTokens(poolId: Hex32): Promise<LedgerPoolTokens> {
    const pool = this.pool(poolId);
    return { tokens: [...pool.tokens], balances: this.balancesOf(pool) };
  }

  async getTotalSupply(poolId: Hex32): Promise<bigint> {
    return this.supplyOf(this.pool(poolId));
  }

  async getShareBalance(poolId: Hex32, account: HexAddress): Promise<bigint> {
    return this.sharesOf(this.pool(poolId), account);
  }

  async simulateSwap(
    poolId: Hex32,
    tokenIn: HexAddress,
    tokenOut: HexAddress,
    amountIn: bigint
  ): Promise<bigint> {
    return this.quote(poolId, tokenIn, tokenOut, amountIn).amountOut;
  }
}

// =============================================================================
// Transaction
// =============================================================================

type TransactionStatus = 'open' | 'committed' | 'rolledBack';

class InMemoryLedgerTransaction extends LedgerView implements LedgerTransaction {
  private status: TransactionStatus = 'open';
  private readonly balanceDeltas = new Map<string, bigint[]>();
  private readonly supplyDeltas = new Map<string, bigint>();
  private readonly shareDeltas = new Map<string, bigint>();
  private readonly walletDeltas = new Map<string, bigint>();

  protected override balancesOf(pool: PoolRecord): bigint[] {
    const deltas = this.balanceDeltas.get(pool.poolId.toLowerCase());
    return pool.balances.map((balance, i) => balance + (deltas?.[i] ?? 0n));
  }

  protected override supplyOf(pool: PoolRecord): bigint {
    return pool.totalSupply + (this.supplyDeltas.get(pool.poolId.toLowerCase()) ?? 0n);
  }

  protected override sharesOf(pool: PoolRecord, account: HexAddress): bigint {
    return (
      super.sharesOf(pool, account) +
      (this.shareDeltas.get(storeKey(pool.poolId, account)) ?? 0n)
    );
  }

  protected override walletOf(account: HexAddress, token: HexAddress): bigint {
    return super.walletOf(account, token) + (this.walletDeltas.get(storeKey(account, token)) ?? 0n);
  }

  async executeSwap(request: SwapRequest): Promise<bigint> {
    this.ensureOpen();
    const { amountOut, inIndex, outIndex } = this.quote(
      request.poolId,
      request.tokenIn,
      request.tokenOut,
      request.amountIn
    );

    if (amountOut < request.minAmountOut) {
      throw new LedgerError('Swap output below limit', {
        amountOut: amountOut.toString(),
        minAmountOut: request.minAmountOut.toString(),
      });
    }

    this.moveWallet(request.account, request.tokenIn, -request.amountIn);
    this.moveWallet(request.account, request.tokenOut, amountOut);

    const delta = [0n, 0n];
    delta[inIndex] = request.amountIn;
    delta[outIndex] = -amountOut;
    this.movePool(request.poolId, delta);

    return amountOut;
  }

  async join(request: JoinRequest): Promise<JoinResult> {
    this.ensureOpen();
    const pool = this.pool(request.poolId);
    this.requirePair(request.amountsIn, 'amountsIn');

    if (request.sharesOut <= 0n) {
      throw new LedgerError('Join must mint shares', { sharesOut: request.sharesOut.toString() });
    }
    request.amountsIn.forEach((amount, i) => {
      if (amount < 0n || amount > (request.maxAmountsIn[i] ?? 0n)) {
        throw new LedgerError('Join amount exceeds limit', {
          token: pool.tokens[i],
          amount: amount.toString(),
        });
      }
    });

    request.amountsIn.forEach((amount, i) => {
      this.moveWallet(request.account, pool.tokens[i], -amount);
    });
    this.movePool(request.poolId, [...request.amountsIn]);
    this.moveShares(pool, request.account, request.sharesOut);

    return { amountsIn: [...request.amountsIn], sharesMinted: request.sharesOut };
  }

  async exit(request: ExitRequest): Promise<ExitResult> {
    this.ensureOpen();
    const pool = this.pool(request.poolId);
    this.requirePair(request.amountsOut, 'amountsOut');

    if (request.sharesIn <= 0n) {
      throw new LedgerError('Exit must burn shares', { sharesIn: request.sharesIn.toString() });
    }
    request.amountsOut.forEach((amount, i) => {
      if (amount < 0n || amount < (request.minAmountsOut[i] ?? 0n)) {
        throw new LedgerError('Exit amount below limit', {
          token: pool.tokens[i],
          amount: amount.toString(),
        });
      }
    });

    this.moveShares(pool, request.account, -request.sharesIn);
    this.movePool(
      request.poolId,
      request.amountsOut.map((amount) => -amount)
    );
    request.amountsOut.forEach((amount, i) => {
      this.moveWallet(request.account, pool.tokens[i], amount);
    });

    return { amountsOut: [...request.amountsOut], sharesBurned: request.sharesIn };
  }

  async commit(): Promise<void> {
    this.ensureOpen();

    // Re-check against the current committed state; another transaction
    // may have committed since this one began
    for (const [poolKey, deltas] of this.balanceDeltas) {
      const pool = this.store.pools.get(poolKey);
      if (!pool || pool.balances.some((balance, i) => balance + (deltas[i] ?? 0n) < 0n)) {
        this.status = 'rolledBack';
        throw new LedgerError('Commit would overdraw pool balances', { poolId: poolKey });
      }
    }
    for (const [walletKey, delta] of this.walletDeltas) {
      if ((this.store.wallets.get(walletKey) ?? 0n) + delta < 0n) {
        this.status = 'rolledBack';
        throw new LedgerError('Commit would overdraw account balance', { wallet: walletKey });
      }
    }

    for (const [poolKey, deltas] of this.balanceDeltas) {
      const pool = this.committedPool(poolKey);
      pool.balances = pool.balances.map((balance, i) => balance + (deltas[i] ?? 0n));
    }
    for (const [poolKey, delta] of this.supplyDeltas) {
      this.committedPool(poolKey).totalSupply += delta;
    }
    for (const [shareKey, delta] of this.shareDeltas) {
      const [poolKey, account] = shareKey.split(':');
      const pool = this.committedPool(poolKey);
      pool.shares.set(account, (pool.shares.get(account) ?? 0n) + delta);
    }
    for (const [walletKey, delta] of this.walletDeltas) {
      this.store.wallets.set(walletKey, (this.store.wallets.get(walletKey) ?? 0n) + delta);
    }

    this.status = 'committed';
    log.debug(
      { pools: [...this.balanceDeltas.keys()], msg: 'Ledger transaction committed' }
    );
  }

  async rollback(): Promise<void> {
    if (this.status === 'committed') {
      throw new LedgerError('Cannot roll back a committed transaction');
    }
    this.status = 'rolledBack';
  }

  private committedPool(poolKey: string): PoolRecord {
    const pool = this.store.pools.get(poolKey);
    if (!pool) {
      throw new LedgerError(`Pool ${poolKey} is not registered with the ledger`);
    }
    return pool;
  }

  private ensureOpen(): void {
    if (this.status !== 'open') {
      throw new LedgerError(`Ledger transaction is ${this.status}`);
    }
  }

  private requirePair(amounts: readonly bigint[], field: string): void {
    if (amounts.length !== 2) {
      throw new LedgerError(`${field} must list exactly two amounts`, { length: amounts.length });
    }
  }

  private moveWallet(account: HexAddress, token: HexAddress, delta: bigint): void {
    if (this.walletOf(account, token) + delta < 0n) {
      throw new LedgerError('Insufficient account balance', {
        account,
        token,
        required: (-delta).toString(),
      });
    }
    const key = storeKey(account, token);
    this.walletDeltas.set(key, (this.walletDeltas.get(key) ?? 0n) + delta);
  }

  private movePool(poolId: Hex32, delta: readonly bigint[]): void {
    const pool = this.pool(poolId);
    const staged = this.balancesOf(pool);
    if (staged.some((balance, i) => balance + (delta[i] ?? 0n) < 0n)) {
      throw new LedgerError('Insufficient pool balance', { poolId });
    }
    const key = poolId.toLowerCase();
    const current = this.balanceDeltas.get(key) ?? [0n, 0n];
    this.balanceDeltas.set(
      key,
      current.map((value, i) => value + (delta[i] ?? 0n))
    );
  }

  private moveShares(pool: PoolRecord, account: HexAddress, delta: bigint): void {
    if (this.sharesOf(pool, account) + delta < 0n) {
      throw new LedgerError('Insufficient share balance', {
        poolId: pool.poolId,
        account,
        required: (-delta).toString(),
      });
    }
    const poolKey = pool.poolId.toLowerCase();
    const shareKey = storeKey(pool.poolId, account);
    this.shareDeltas.set(shareKey, (this.shareDeltas.get(shareKey) ?? 0n) + delta);
    this.supplyDeltas.set(poolKey, (this.supplyDeltas.get(poolKey) ?? 0n) + delta);
  }
}

// =============================================================================
// Ledger
// =============================================================================

export class InMemoryBalanceLedger extends LedgerView implements BalanceLedger {
  constructor(quoter: SwapQuoter) {
    super({ pools: new Map(), wallets: new Map() }, quoter);
  }

  async begin(): Promise<LedgerTransaction> {
    return new InMemoryLedgerTransaction(this.store, this.quoter);
  }

  /**
   * Register a two-token pool; tokens are stored in ascending address order
   */
  createPool(
    poolId: Hex32,
    holdings: ReadonlyArray<{ token: HexAddress; balance: bigint }>
  ): void {
    const key = poolId.toLowerCase();
    if (this.store.pools.has(key)) {
      throw new LedgerError(`Pool ${poolId} is already registered with the ledger`, { poolId });
    }
    if (holdings.length !== 2) {
      throw new LedgerError('Ledger pools hold exactly two tokens', { poolId });
    }

    const sorted = [...holdings].sort((a, b) => compareAddresses(a.token, b.token));
    this.store.pools.set(key, {
      poolId,
      tokens: sorted.map((holding) => holding.token),
      balances: sorted.map((holding) => holding.balance),
      totalSupply: 0n,
      shares: new Map(),
    });
  }

  /**
   * Seed a share position outside any transaction
   */
  mintShares(poolId: Hex32, account: HexAddress, shares: bigint): void {
    const pool = this.pool(poolId);
    const holder = account.toLowerCase();
    pool.shares.set(holder, (pool.shares.get(holder) ?? 0n) + shares);
    pool.totalSupply += shares;
  }

  /**
   * Credit an account with tokens outside any transaction
   */
  fund(account: HexAddress, token: HexAddress, amount: bigint): void {
    const key = storeKey(account, token);
    this.store.wallets.set(key, (this.store.wallets.get(key) ?? 0n) + amount);
  }

  walletBalance(account: HexAddress, token: HexAddress): bigint {
    return this.walletOf(account, token);
  }
}
