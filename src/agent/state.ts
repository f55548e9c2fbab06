/**
 * Agent state machine.
 *
 * The machine is closed: `nextState` is the only way to derive a new state, and
 * any (state, event) pair outside the table throws IllegalTransitionError.
 */

import { IllegalTransitionError } from '../core/errors.js';

export const AGENT_STATES = [
  'IDLE',
  'RECOVERING',
  'PERCEPTION',
  'REASONING',
  'RISK_CHECK',
  'EXECUTION',
  'LEARNING',
] as const;

export type AgentState = (typeof AGENT_STATES)[number];

export const AGENT_EVENTS = [
  'recovery_finished',
  'cycle_started',
  'snapshot_fresh',
  'snapshot_unusable',
  'decision_produced',
  'decision_unavailable',
  'verdict_approved',
  'execution_skipped',
  'execution_finished',
  'learning_finished',
] as const;

export type AgentEventType = (typeof AGENT_EVENTS)[number];

export interface AgentEvent {
  type: AgentEventType;
}

function illegal(state: AgentState, event: AgentEvent): never {
  throw new IllegalTransitionError(state, event.type);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled agent state: ${String(value)}`);
}

export function nextState(state: AgentState, event: AgentEvent): AgentState {
  switch (state) {
    case 'RECOVERING':
      return event.type === 'recovery_finished' ? 'PERCEPTION' : illegal(state, event);
    case 'IDLE':
      return event.type === 'cycle_started' ? 'PERCEPTION' : illegal(state, event);
    case 'PERCEPTION':
      if (event.type === 'snapshot_fresh') return 'REASONING';
      if (event.type === 'snapshot_unusable') return 'IDLE';
      return illegal(state, event);
    case 'REASONING':
      if (event.type === 'decision_produced') return 'RISK_CHECK';
      if (event.type === 'decision_unavailable') return 'IDLE';
      return illegal(state, event);
    case 'RISK_CHECK':
      if (event.type === 'verdict_approved') return 'EXECUTION';
      if (event.type === 'execution_skipped') return 'LEARNING';
      return illegal(state, event);
    case 'EXECUTION':
      return event.type === 'execution_finished' ? 'LEARNING' : illegal(state, event);
    case 'LEARNING':
      return event.type === 'learning_finished' ? 'IDLE' : illegal(state, event);
    default:
      return assertNever(state);
  }
}

/**
 * States reachable from `state` in one step.
 */
export function reachableFrom(state: AgentState): AgentState[] {
  const targets = new Set<AgentState>();
  for (const type of AGENT_EVENTS) {
    try {
      targets.add(nextState(state, { type }));
    } catch (error) {
      if (!(error instanceof IllegalTransitionError)) throw error;
    }
  }
  return [...targets];
}

/**
 * States in which capital can be committed. Entering them requires a finished
 * recovery and an unhalted agent.
 */
export function isTradingState(state: AgentState): boolean {
  return state === 'RISK_CHECK' || state === 'EXECUTION';
}
