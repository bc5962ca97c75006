import { ENTITLEMENT_LEDGER_SCHEMA_SQL } from './001_entitlement_ledger.js';

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

/** Applied in ascending version order */
export const MIGRATIONS: readonly Migration[] = [
  { version: 1, name: 'entitlement_ledger', sql: ENTITLEMENT_LEDGER_SCHEMA_SQL },
];
