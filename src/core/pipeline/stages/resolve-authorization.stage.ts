import { Protocol } from '../../domain/enums';
import { StorageAdapter } from '../../interfaces';
import { AuthorizationNotFoundError } from '../../services/errors';
import {
  InboundWebhookContext,
  PipelineStage,
  PspNotAllowedError,
  StageResult,
} from '../types';

/**
 * Stage 4: Resolve authorization
 * Looks the ACP token up within the tenant and checks its PSP against the
 * allowlist (an empty allowlist admits every PSP)
 */
export class ResolveAuthorizationStage implements PipelineStage {
  name = 'resolve-authorization';

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly pspAllowlist: string[] = [],
  ) {}

  async execute(context: InboundWebhookContext): Promise<StageResult> {
    const event = context.event;
    if (!event) {
      throw new Error('Authorization lookup requires a parsed event');
    }

    const authorization = await this.storageAdapter.findAuthorizationByTokenId(
      context.tenantId,
      event.tokenId,
    );
    if (!authorization || authorization.protocol !== Protocol.ACP) {
      throw new AuthorizationNotFoundError(
        `No ACP authorization for token ${event.tokenId}`,
        undefined,
        event.tokenId,
      );
    }

    if (this.pspAllowlist.length > 0 && !this.pspAllowlist.includes(authorization.issuer)) {
      throw new PspNotAllowedError(
        `PSP '${authorization.issuer}' is not in the allowlist`,
        authorization.issuer,
        this.pspAllowlist,
      );
    }

    context.authorization = authorization;
    return { success: true, context, shouldContinue: true };
  }
}
