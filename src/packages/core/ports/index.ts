export type * from './IEntitlementStore.js';
export type * from './IRoleAuthority.js';
export type * from './IWallet.js';
export type * from './INotifier.js';
export type * from './ICollaborators.js';
