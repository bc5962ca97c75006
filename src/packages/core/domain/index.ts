export * from './entitlement.js';
export * from './tier-catalog.js';
export * from './refund.js';
export * from './purchase-plan.js';
export * from './notification.js';
