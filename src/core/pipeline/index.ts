/**
 * Inbound protocol webhook pipeline:
 * 1. Signature verification
 * 2. Parse
 * 3. Deduplication
 * 4. Resolve authorization
 * 5. Lifecycle
 */

// Main processor
export {
  InboundWebhookProcessor,
  InboundPipelineConfig,
  DEFAULT_INBOUND_CLAIM_LEASE_MS,
} from './inbound-webhook-processor';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { SignatureVerificationStage, ACP_SIGNATURE_HEADER } from './stages/signature-verification.stage';
export { ParseStage } from './stages/parse.stage';
export { DeduplicationStage } from './stages/deduplication.stage';
export { ResolveAuthorizationStage } from './stages/resolve-authorization.stage';
export { LifecycleStage, DEFAULT_PSP_REVOKE_REASON } from './stages/lifecycle.stage';
