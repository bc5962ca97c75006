export { BoundedRoleAuthority, type BoundedRoleAuthorityOptions } from './BoundedRoleAuthority.js';
export { withTimeout } from './timeout.js';
