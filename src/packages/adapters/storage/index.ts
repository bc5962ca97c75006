export { SqliteEntitlementStore } from './SqliteEntitlementStore.js';
export { SqliteWallet } from './SqliteWallet.js';
export { SqliteNotificationLog } from './SqliteNotificationLog.js';
export { SqlitePaymentLog } from './SqlitePaymentLog.js';
export { SqlitePrivilegeRevoker } from './SqlitePrivilegeRevoker.js';
export { KeyedLock } from './AccountLock.js';
