import {
  AlertService,
  AuthorizationService,
  AuthorizationServiceOptions,
  AuthorizationStateMachine,
  CachingTruststore,
  CredentialFactory,
  CredentialNormalizer,
  DEFAULT_ALLOWED_ALGORITHMS,
  DEFAULT_AUTHORIZATION_SERVICE_OPTIONS,
  EventDispatcherImpl,
  EvidenceService,
  IssuerRegistration,
  LifecycleEvent,
  MockStorageAdapter,
  Protocol,
  StaticKeySource,
  StorageAuditRecorder,
  TrustVerifier,
  WebhookDispatcher,
  WebhookRequest,
  WebhookResponse,
  WebhookTransport,
} from '../../src/testing';

export const TENANT = 'tenant-a';
export const OTHER_TENANT = 'tenant-b';
export const ACP_SECRET = 'test-secret';
export const START = new Date('2026-01-01T00:00:00.000Z');

/**
 * Settable clock shared by every component of a test engine
 */
export class TestClock {
  private current: Date;

  constructor(start: Date = START) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }
}

/**
 * Transport answering from a queue of scripted responses; an Error entry is thrown
 */
export class ScriptedTransport implements WebhookTransport {
  readonly requests: WebhookRequest[] = [];
  private readonly script: Array<WebhookResponse | Error> = [];

  constructor(private readonly fallback: WebhookResponse = { statusCode: 200, body: 'ok' }) {}

  respondWith(...responses: Array<WebhookResponse | Error>): this {
    this.script.push(...responses);
    return this;
  }

  async send(request: WebhookRequest): Promise<WebhookResponse> {
    this.requests.push(request);
    const next = this.script.shift() ?? this.fallback;
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export interface TestEngineOptions {
  issuers?: IssuerRegistration[];
  service?: Partial<AuthorizationServiceOptions>;
  transport?: WebhookTransport;
}

export interface TestEngine {
  clock: TestClock;
  storage: MockStorageAdapter;
  keySource: StaticKeySource;
  verifier: TrustVerifier;
  eventDispatcher: EventDispatcherImpl;
  alertService: AlertService;
  webhookDispatcher: WebhookDispatcher;
  authorizationService: AuthorizationService;
  evidenceService: EvidenceService;
  factory: CredentialFactory;
  events: LifecycleEvent[];
}

export const ACP_ISSUER: IssuerRegistration = {
  issuer: 'psp-test',
  protocol: Protocol.ACP,
  material: { kind: 'shared-secret', secrets: [ACP_SECRET] },
};

/**
 * Engine wired over in-memory storage with a controllable clock
 */
export function createTestEngine(options: TestEngineOptions = {}): TestEngine {
  const clock = new TestClock();
  const storage = new MockStorageAdapter({ clock: clock.now });
  const keySource = new StaticKeySource(options.issuers ?? [ACP_ISSUER]);
  const truststore = new CachingTruststore([keySource], { cacheTtlMs: 0, resolveTimeoutMs: 1000 });
  const verifier = new TrustVerifier(truststore, {
    allowedAlgorithms: DEFAULT_ALLOWED_ALGORITHMS,
    clockToleranceSeconds: 0,
    clock: clock.now,
  });
  const auditRecorder = new StorageAuditRecorder(storage);
  const alertService = new AlertService(storage, clock.now);
  const webhookDispatcher = new WebhookDispatcher(
    storage,
    options.transport ?? new ScriptedTransport(),
    alertService,
    {},
    clock.now,
  );

  const events: LifecycleEvent[] = [];
  const eventDispatcher = new EventDispatcherImpl();
  eventDispatcher.onAll((event) => {
    events.push(event);
  });
  eventDispatcher.onAll(webhookDispatcher.getHandler());

  const authorizationService = new AuthorizationService(
    storage,
    new CredentialNormalizer(),
    verifier,
    new AuthorizationStateMachine(),
    auditRecorder,
    eventDispatcher,
    { ...DEFAULT_AUTHORIZATION_SERVICE_OPTIONS, ...options.service, clock: clock.now },
    alertService,
  );

  return {
    clock,
    storage,
    keySource,
    verifier,
    eventDispatcher,
    alertService,
    webhookDispatcher,
    authorizationService,
    evidenceService: new EvidenceService(storage, auditRecorder, clock.now),
    factory: new CredentialFactory(clock.now),
    events,
  };
}
