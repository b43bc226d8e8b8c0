import { AuthorizationStatus, TriggerType } from '../domain/enums';
import { StateTransition } from './types';
import { TRANSITION_RULES, getTerminalStates } from './transition-rules';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * State machine validator - ensures transition rules are consistent and valid
 */
export class StateMachineValidator {
  private readonly errors: string[] = [];
  private readonly warnings: string[] = [];

  constructor(private readonly transitions: StateTransition[] = TRANSITION_RULES) {}

  /**
   * Validate the entire state machine configuration
   */
  validate(): ValidationResult {
    this.errors.length = 0;
    this.warnings.length = 0;

    this.validateStatesAndTriggers();
    this.validateTerminalStates();
    this.validateNoDuplicateTransitions();
    this.validateLiveStatesCanEnd();

    return {
      valid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
    };
  }

  private validateStatesAndTriggers(): void {
    const validStates = Object.values(AuthorizationStatus);
    const validTriggers = Object.values(TriggerType);

    for (const transition of this.transitions) {
      if (!validStates.includes(transition.from)) {
        this.errors.push(`Invalid 'from' state: ${transition.from}`);
      }
      if (!validStates.includes(transition.to)) {
        this.errors.push(`Invalid 'to' state: ${transition.to}`);
      }
      if (transition.triggers.length === 0) {
        this.errors.push(`Transition ${transition.from} -> ${transition.to} has no triggers`);
      }
      for (const trigger of transition.triggers) {
        if (!validTriggers.includes(trigger)) {
          this.errors.push(
            `Invalid trigger '${trigger}' in transition ${transition.from} -> ${transition.to}`,
          );
        }
      }
      if (transition.triggers.includes(TriggerType.CREATE)) {
        this.warnings.push(
          `CREATE trigger on ${transition.from} -> ${transition.to}; initial status is assigned, not transitioned`,
        );
      }
    }
  }

  /**
   * Validate terminal states have no outgoing transitions
   */
  private validateTerminalStates(): void {
    const terminalStates = getTerminalStates();
    for (const transition of this.transitions) {
      if (terminalStates.includes(transition.from)) {
        this.errors.push(
          `Terminal state '${transition.from}' has outgoing transition to '${transition.to}'`,
        );
      }
    }
  }

  private validateNoDuplicateTransitions(): void {
    const seen = new Set<string>();
    for (const transition of this.transitions) {
      const key = `${transition.from}->${transition.to}`;
      if (seen.has(key)) {
        this.errors.push(`Duplicate transition defined: ${key}`);
      }
      seen.add(key);
    }
  }

  /**
   * Every non-terminal state needs a path to REVOKED
   */
  private validateLiveStatesCanEnd(): void {
    const terminalStates = getTerminalStates();
    for (const state of Object.values(AuthorizationStatus)) {
      if (terminalStates.includes(state)) {
        continue;
      }
      const canRevoke = this.transitions.some(
        (t) => t.from === state && t.to === AuthorizationStatus.REVOKED,
      );
      if (!canRevoke) {
        this.errors.push(`State '${state}' has no transition to ${AuthorizationStatus.REVOKED}`);
      }
    }
  }
}
