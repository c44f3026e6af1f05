import { describe, it, expect } from 'vitest';
import { TransitionError } from '../../src/utils/appError';
import {
  assertTransition,
  canTransition,
  isTerminalStatus,
  settlementPath,
} from '../../src/services/taskStateMachine';

describe('task state machine', () => {
  it.each([
    ['pending', 'processing'],
    ['pending', 'failed'],
    ['processing', 'completed'],
    ['processing', 'failed'],
  ] as const)('allows %s -> %s', (from, to) => {
    expect(canTransition(from, to)).toBe(true);
  });

  it.each([
    ['pending', 'completed'],
    ['pending', 'pending'],
    ['processing', 'pending'],
    ['completed', 'failed'],
    ['completed', 'processing'],
    ['failed', 'processing'],
  ] as const)('rejects %s -> %s', (from, to) => {
    expect(canTransition(from, to)).toBe(false);
  });

  it('treats completed and failed as terminal', () => {
    expect(isTerminalStatus('completed')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('pending')).toBe(false);
    expect(isTerminalStatus('processing')).toBe(false);
  });

  it('names the allowed targets when rejecting a transition', () => {
    expect(() => assertTransition('t-1', 'processing', 'pending')).toThrow(
      'Task t-1 cannot move from processing to pending (allowed from processing: completed, failed)'
    );
    expect(() => assertTransition('t-1', 'completed', 'failed')).toThrow(TransitionError);
    expect(() => assertTransition('t-1', 'completed', 'failed')).toThrow('task is already completed');
  });

  describe('settlementPath', () => {
    it('passes a pending task through processing on success', () => {
      expect(settlementPath('t-1', 'pending', true)).toEqual(['processing', 'completed']);
    });

    it('fails a pending task directly', () => {
      expect(settlementPath('t-1', 'pending', false)).toEqual(['failed']);
    });

    it('settles a processing task in one step', () => {
      expect(settlementPath('t-1', 'processing', true)).toEqual(['completed']);
      expect(settlementPath('t-1', 'processing', false)).toEqual(['failed']);
    });

    it('refuses to settle a terminal task again', () => {
      expect(() => settlementPath('t-1', 'completed', true)).toThrow(TransitionError);
      expect(() => settlementPath('t-1', 'failed', false)).toThrow(TransitionError);
    });
  });
});
