/**
 * IWallet - Port Interface for per-account currency balances
 *
 * @module packages/core/ports/IWallet
 */

export interface IWallet {
  /** Adds to the balance and returns the new balance */
  credit(accountId: string, amount: number): Promise<number>;

  /** Atomically subtracts when the balance covers it; false otherwise */
  debit(accountId: string, amount: number): Promise<boolean>;

  balanceOf(accountId: string): Promise<number>;
}
