import {
  AuthorizationStatus,
  Protocol,
  TriggerType,
  liveStatusFor,
} from '../domain/enums';
import {
  StateTransition,
  TransitionContext,
  TransitionResult,
  TransitionGuard,
  TransitionCondition,
  StateMachineConfig,
  AlreadyRevokedError,
  InvalidTransitionError,
} from './types';
import { TRANSITION_RULES, isTerminalState } from './transition-rules';

/**
 * Authorization state machine - enforces valid lifecycle transitions
 */
export class AuthorizationStateMachine {
  private readonly config: StateMachineConfig;
  private readonly transitions: Map<string, StateTransition>;
  private readonly guards: Map<string, TransitionGuard[]>;
  private readonly conditions: Map<string, TransitionCondition[]>;

  constructor(config?: Partial<StateMachineConfig>) {
    this.config = {
      transitions: TRANSITION_RULES,
      strictMode: true,
      ...config,
    };

    this.transitions = new Map();
    this.guards = new Map();
    this.conditions = new Map();

    for (const transition of this.config.transitions) {
      const key = this.getTransitionKey(transition.from, transition.to);
      this.transitions.set(key, transition);
      this.guards.set(key, [...(transition.guards ?? [])]);
      this.conditions.set(key, [...(transition.conditions ?? [])]);
    }
  }

  /**
   * Status a newly created authorization starts in
   */
  initialStatus(protocol: Protocol, expiresAt: Date, now: Date): AuthorizationStatus {
    return expiresAt.getTime() <= now.getTime()
      ? AuthorizationStatus.EXPIRED
      : liveStatusFor(protocol);
  }

  /**
   * Validate a state transition
   */
  async validateTransition(
    from: AuthorizationStatus,
    to: AuthorizationStatus,
    context: Partial<TransitionContext>,
  ): Promise<TransitionResult> {
    const fullContext: TransitionContext = {
      ...context,
      currentStatus: from,
      targetStatus: to,
      triggerType: context.triggerType ?? TriggerType.MANUAL,
    };

    if (isTerminalState(from)) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        reason: `Cannot transition from terminal state: ${from}`,
      };
    }

    const transition = this.findTransition(from, to);
    if (!transition && this.config.strictMode) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        reason: `Transition from ${from} to ${to} is not defined`,
      };
    }

    if (transition && !transition.triggers.includes(fullContext.triggerType)) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        reason: `Trigger type ${fullContext.triggerType} is not valid for transition from ${from} to ${to}`,
      };
    }

    const conditionResult = await this.evaluateConditions(from, to, fullContext);
    if (!conditionResult.success) {
      return conditionResult;
    }

    const guardResult = await this.checkGuards(from, to, fullContext);
    if (!guardResult.success) {
      return guardResult;
    }

    return {
      success: true,
      fromStatus: from,
      toStatus: to,
      metadata: transition?.metadata,
    };
  }

  /**
   * Validate and throw the lifecycle error for a rejected transition
   */
  async assertTransition(
    authorizationId: string,
    from: AuthorizationStatus,
    to: AuthorizationStatus,
    context: Partial<TransitionContext> & { revokedAt?: Date | null },
  ): Promise<TransitionResult> {
    if (from === AuthorizationStatus.REVOKED && to === AuthorizationStatus.REVOKED) {
      throw new AlreadyRevokedError(
        `Authorization ${authorizationId} is already revoked`,
        authorizationId,
        context.revokedAt ?? null,
      );
    }

    const result = await this.validateTransition(from, to, context);
    if (!result.success) {
      const detail = [
        ...(result.conditionFailures ?? []),
        ...(result.guardFailures ?? []),
      ].join('; ');
      throw new InvalidTransitionError(
        `Cannot move authorization ${authorizationId} from ${from} to ${to}: ${result.reason}${detail ? ` (${detail})` : ''}`,
        from,
        to,
        result,
      );
    }
    return result;
  }

  /**
   * Check if a transition is possible
   */
  canTransition(
    from: AuthorizationStatus,
    to: AuthorizationStatus,
    triggerType?: TriggerType,
  ): boolean {
    if (isTerminalState(from)) {
      return false;
    }
    const transition = this.findTransition(from, to);
    if (!transition) {
      return false;
    }
    return !triggerType || transition.triggers.includes(triggerType);
  }

  /**
   * Get all possible next states from current state
   */
  getNextStates(currentStatus: AuthorizationStatus): AuthorizationStatus[] {
    if (isTerminalState(currentStatus)) {
      return [];
    }
    const nextStates: AuthorizationStatus[] = [];
    for (const transition of this.transitions.values()) {
      if (transition.from === currentStatus) {
        nextStates.push(transition.to);
      }
    }
    return nextStates;
  }

  /**
   * Add a custom guard to a transition
   */
  addGuard(
    from: AuthorizationStatus,
    to: AuthorizationStatus,
    guard: TransitionGuard,
  ): void {
    const key = this.getTransitionKey(from, to);
    this.guards.set(key, [...(this.guards.get(key) ?? []), guard]);
  }

  private async evaluateConditions(
    from: AuthorizationStatus,
    to: AuthorizationStatus,
    context: TransitionContext,
  ): Promise<TransitionResult> {
    const conditions = this.conditions.get(this.getTransitionKey(from, to)) ?? [];
    const failures: string[] = [];

    for (const condition of conditions) {
      try {
        if (!(await condition.evaluate(context))) {
          failures.push(condition.errorMessage ?? `Condition ${condition.name} failed`);
        }
      } catch (error) {
        failures.push(
          `Condition ${condition.name} threw error: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    if (failures.length > 0) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        reason: 'Transition conditions not met',
        conditionFailures: failures,
      };
    }
    return { success: true, fromStatus: from, toStatus: to };
  }

  private async checkGuards(
    from: AuthorizationStatus,
    to: AuthorizationStatus,
    context: TransitionContext,
  ): Promise<TransitionResult> {
    const guards = this.guards.get(this.getTransitionKey(from, to)) ?? [];
    const failures: string[] = [];

    for (const guard of guards) {
      try {
        const result = await guard.check(context);
        if (!result.allowed) {
          failures.push(result.reason ?? `Guard ${guard.name} blocked transition`);
        }
      } catch (error) {
        failures.push(
          `Guard ${guard.name} threw error: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    if (failures.length > 0) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        reason: 'Transition blocked by guards',
        guardFailures: failures,
      };
    }
    return { success: true, fromStatus: from, toStatus: to };
  }

  private findTransition(
    from: AuthorizationStatus,
    to: AuthorizationStatus,
  ): StateTransition | undefined {
    return this.transitions.get(this.getTransitionKey(from, to));
  }

  private getTransitionKey(from: AuthorizationStatus, to: AuthorizationStatus): string {
    return `${from}->${to}`;
  }
}
