/**
 * Migration 001: Entitlement Ledger
 *
 * - entitlements: one row per (account, tier) with its expiry
 * - wallets: per-account currency balance
 * - handled_payments: idempotency record for ingested payments
 * - notification_log: last send time of tagged notifications
 * - delegated_privileges: privileges a tier holder handed to others
 */

export const ENTITLEMENT_LEDGER_SCHEMA_SQL = `
-- =============================================================================
-- Entitlements
-- =============================================================================
-- expires_at uses datetime('now') format so range scans compare as strings.
-- external_assignment_id is the handle returned by the role authority.

CREATE TABLE IF NOT EXISTS entitlements (
  account_id TEXT NOT NULL,
  tier_name TEXT NOT NULL,
  expires_at TEXT NOT NULL,
  external_assignment_id TEXT,
  created_at TEXT DEFAULT (datetime('now')) NOT NULL,
  updated_at TEXT DEFAULT (datetime('now')) NOT NULL,
  PRIMARY KEY (account_id, tier_name)
);

CREATE INDEX IF NOT EXISTS idx_entitlements_expires_at
  ON entitlements(expires_at);

CREATE INDEX IF NOT EXISTS idx_entitlements_tier
  ON entitlements(tier_name);

-- =============================================================================
-- Wallets
-- =============================================================================

CREATE TABLE IF NOT EXISTS wallets (
  account_id TEXT PRIMARY KEY,
  balance INTEGER NOT NULL DEFAULT 0 CHECK (balance >= 0),
  updated_at TEXT DEFAULT (datetime('now')) NOT NULL
);

-- =============================================================================
-- Handled Payments
-- =============================================================================
-- account_id is NULL when the payer could not be resolved.

CREATE TABLE IF NOT EXISTS handled_payments (
  payment_id TEXT PRIMARY KEY,
  account_id TEXT,
  amount INTEGER NOT NULL,
  source TEXT NOT NULL,
  received_at TEXT NOT NULL,
  outcome TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_handled_payments_account
  ON handled_payments(account_id);

-- =============================================================================
-- Notification Log
-- =============================================================================

CREATE TABLE IF NOT EXISTS notification_log (
  account_id TEXT NOT NULL,
  tag TEXT NOT NULL,
  sent_at TEXT NOT NULL,
  PRIMARY KEY (account_id, tag)
);

-- =============================================================================
-- Delegated Privileges
-- =============================================================================

CREATE TABLE IF NOT EXISTS delegated_privileges (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_account_id TEXT NOT NULL,
  grantee_account_id TEXT NOT NULL,
  scope TEXT NOT NULL,
  created_at TEXT DEFAULT (datetime('now')) NOT NULL,
  UNIQUE (owner_account_id, grantee_account_id, scope)
);

CREATE INDEX IF NOT EXISTS idx_delegated_privileges_owner
  ON delegated_privileges(owner_account_id);
`;
