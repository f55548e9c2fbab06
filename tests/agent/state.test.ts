import { describe, expect, it } from 'vitest';

import {
  AGENT_EVENTS,
  AGENT_STATES,
  isTradingState,
  nextState,
  reachableFrom,
  type AgentEventType,
  type AgentState,
} from '../../src/agent/state.js';
import { IllegalTransitionError } from '../../src/core/errors.js';

const TABLE: Array<[AgentState, AgentEventType, AgentState]> = [
  ['RECOVERING', 'recovery_finished', 'PERCEPTION'],
  ['IDLE', 'cycle_started', 'PERCEPTION'],
  ['PERCEPTION', 'snapshot_fresh', 'REASONING'],
  ['PERCEPTION', 'snapshot_unusable', 'IDLE'],
  ['REASONING', 'decision_produced', 'RISK_CHECK'],
  ['REASONING', 'decision_unavailable', 'IDLE'],
  ['RISK_CHECK', 'verdict_approved', 'EXECUTION'],
  ['RISK_CHECK', 'execution_skipped', 'LEARNING'],
  ['EXECUTION', 'execution_finished', 'LEARNING'],
  ['LEARNING', 'learning_finished', 'IDLE'],
];

describe('nextState', () => {
  it.each(TABLE)('%s --%s--> %s', (from, event, to) => {
    expect(nextState(from, { type: event })).toBe(to);
  });

  it('throws IllegalTransitionError for every pair outside the table', () => {
    const allowed = new Set(TABLE.map(([from, event]) => `${from}:${event}`));
    let illegal = 0;
    for (const state of AGENT_STATES) {
      for (const event of AGENT_EVENTS) {
        if (allowed.has(`${state}:${event}`)) continue;
        expect(() => nextState(state, { type: event })).toThrow(IllegalTransitionError);
        illegal += 1;
      }
    }
    expect(illegal).toBe(AGENT_STATES.length * AGENT_EVENTS.length - TABLE.length);
  });

  it('reports the state and event of an illegal transition', () => {
    try {
      nextState('IDLE', { type: 'verdict_approved' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IllegalTransitionError);
      if (error instanceof IllegalTransitionError) {
        expect(error.from).toBe('IDLE');
        expect(error.event).toBe('verdict_approved');
      }
    }
  });
});

describe('reachableFrom', () => {
  it('only reaches EXECUTION from RISK_CHECK', () => {
    const sources = AGENT_STATES.filter((state) => reachableFrom(state).includes('EXECUTION'));
    expect(sources).toEqual(['RISK_CHECK']);
  });

  it('never re-enters RECOVERING', () => {
    for (const state of AGENT_STATES) {
      expect(reachableFrom(state)).not.toContain('RECOVERING');
    }
  });

  it('lists both exits of RISK_CHECK', () => {
    expect(reachableFrom('RISK_CHECK')).toEqual(['EXECUTION', 'LEARNING']);
  });
});

describe('isTradingState', () => {
  it('marks risk check and execution only', () => {
    expect(AGENT_STATES.filter(isTradingState)).toEqual(['RISK_CHECK', 'EXECUTION']);
  });
});
