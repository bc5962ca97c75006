export {
  PurchaseDecisionEngine,
  PurchaseRequestSchema,
  type PurchaseDecisionEngineDeps,
  type PurchaseRequest,
  type PurchaseResult,
} from './PurchaseDecisionEngine.js';
export { SaleService, type SaleResult, type SaleFailureReason, type SaleServiceDeps } from './SaleService.js';
export {
  PaymentIntakeService,
  ResolvedPaymentSchema,
  type IngestResult,
  type IngestStatus,
  type PaymentIntakeDeps,
  type PaymentTarget,
  type ResolvedPayment,
} from './PaymentIntakeService.js';
