import { WebhookSigner } from '../../delivery/webhook-signer';
import {
  InboundSignatureError,
  InboundWebhookContext,
  PipelineStage,
  StageResult,
  TenantSecretResolver,
} from '../types';

export const ACP_SIGNATURE_HEADER = 'x-acp-signature';

/**
 * Stage 1: Signature verification
 * HMAC-SHA256 of the raw body against any of the tenant's secrets
 */
export class SignatureVerificationStage implements PipelineStage {
  name = 'signature-verification';

  constructor(private readonly resolveSecrets: TenantSecretResolver) {}

  async execute(context: InboundWebhookContext): Promise<StageResult> {
    const signature = context.headers[ACP_SIGNATURE_HEADER];
    if (!signature) {
      throw new InboundSignatureError('Missing X-ACP-Signature header', context.tenantId);
    }

    const secrets = this.resolveSecrets(context.tenantId);
    if (secrets.length === 0) {
      throw new InboundSignatureError(
        `No webhook secret configured for tenant ${context.tenantId}`,
        context.tenantId,
      );
    }

    if (!WebhookSigner.verify(context.rawBody, signature, secrets)) {
      throw new InboundSignatureError('Invalid X-ACP-Signature', context.tenantId);
    }

    return { success: true, context, shouldContinue: true };
  }
}
