import { AuthorizationStatus, InboundEventType, TriggerType } from '../../domain/enums';
import { isJsonObject } from '../../domain/models';
import { AuthorizationService } from '../../services/authorization.service';
import { AlreadyRevokedError } from '../../state-machine';
import { InboundWebhookContext, PipelineStage, StageResult } from '../types';

export const DEFAULT_PSP_REVOKE_REASON = 'Revoked by PSP';

/**
 * Stage 5: Lifecycle
 * token.revoked revokes the authorization; token.used records usage only
 */
export class LifecycleStage implements PipelineStage {
  name = 'lifecycle';

  constructor(private readonly authorizationService: AuthorizationService) {}

  async execute(context: InboundWebhookContext): Promise<StageResult> {
    const { event, authorization } = context;
    if (!event || !authorization) {
      throw new Error('Lifecycle stage requires a parsed event and an authorization');
    }

    const actor = `psp:${authorization.issuer}`;

    switch (event.eventType) {
      case InboundEventType.TOKEN_REVOKED: {
        if (authorization.status === AuthorizationStatus.REVOKED) {
          return { success: true, context, shouldContinue: true, metadata: { transition: false } };
        }
        const reasonValue = event.data['reason'];
        const reason =
          typeof reasonValue === 'string' && reasonValue.trim() ? reasonValue.trim() : DEFAULT_PSP_REVOKE_REASON;
        const revokedBy = event.data['revoked_by'];

        try {
          context.authorization = await this.authorizationService.revoke(
            context.tenantId,
            authorization.id,
            reason,
            {
              triggerType: TriggerType.PROTOCOL_WEBHOOK,
              actor,
              metadata: {
                eventId: event.eventId,
                tokenId: event.tokenId,
                revokedBy: typeof revokedBy === 'string' ? revokedBy : null,
              },
            },
          );
        } catch (error) {
          if (error instanceof AlreadyRevokedError) {
            return { success: true, context, shouldContinue: true, metadata: { transition: false } };
          }
          throw error;
        }
        return { success: true, context, shouldContinue: true, metadata: { transition: true } };
      }

      case InboundEventType.TOKEN_USED: {
        const { data } = event;
        const amount = data['amount'];
        const currency = data['currency'];
        const transactionId = data['transaction_id'];
        const merchantId = data['merchant_id'];
        const metadata = data['metadata'];

        const result = await this.authorizationService.recordUsage(
          context.tenantId,
          authorization.id,
          {
            amount: typeof amount === 'string' || typeof amount === 'number' ? amount : null,
            currency: typeof currency === 'string' ? currency : null,
            transactionId: typeof transactionId === 'string' ? transactionId : null,
            merchantId: typeof merchantId === 'string' ? merchantId : null,
            metadata: isJsonObject(metadata) ? metadata : {},
            source: 'acp_webhook',
          },
          { actor },
        );
        context.authorization = result.authorization;
        return {
          success: true,
          context,
          shouldContinue: true,
          metadata: { transition: false, exceedsLimit: result.exceedsLimit },
        };
      }
    }
  }
}
