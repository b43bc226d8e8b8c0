/**
 * Mandate NestJS Module
 *
 * HTTP surface and background processors for the mandate engine
 */

// Main module
export { MandateModule } from './mandate.module';

// Configuration
export {
  MandateModuleConfig,
  MandateModuleAsyncConfig,
  ResolvedMandateConfig,
  defaultMandateConfig,
  resolveMandateConfig,
} from './mandate.config';

// Injection tokens
export * from './constants';

// Controllers
export * from './controllers';

// Services
export { ConfigurationService } from './services/configuration.service';
export { DeliveryRetryProcessor } from './services/delivery-retry.processor';
export { LifecycleSweepProcessor, SweepResult } from './services/lifecycle-sweep.processor';

// Request helpers
export { TenantId, AuditContext } from './decorators/request-context.decorator';
export { toHttpException, withHttpErrors } from './http-errors';

// Interceptors
export { RawBodyInterceptor } from './interceptors/raw-body.interceptor';
