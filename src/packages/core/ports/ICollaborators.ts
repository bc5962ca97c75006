/**
 * Side-effect collaborators invoked after entitlement changes commit.
 *
 * @module packages/core/ports/ICollaborators
 */

/**
 * Removes restriction markers (e.g. mute roles) from an account.
 */
export interface IRestrictionService {
  /** Returns how many markers were removed; 0 when none were present */
  clearRestrictions(accountId: string): Promise<number>;
}

/**
 * Removes privileges an entitlement holder delegated to other accounts.
 */
export interface IPrivilegeRevoker {
  /** Returns how many delegated privileges were removed */
  stripDependentPrivileges(accountId: string): Promise<number>;
}

/**
 * Idempotency ledger for ingested payments.
 */
export interface IPaymentLog {
  /** Records a newly received payment; false when the id was seen before */
  claim(entry: HandledPayment): Promise<boolean>;
  /** Stores the final outcome of a claimed payment */
  complete(paymentId: string, outcome: string): Promise<void>;
}

export interface HandledPayment {
  paymentId: string;
  accountId: string | null;
  amount: number;
  source: string;
  receivedAt: Date;
  outcome: string;
}
