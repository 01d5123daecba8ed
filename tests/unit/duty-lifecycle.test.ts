/**
 * Unit tests for the duty lifecycle state machine
 */

import { describe, it, expect } from '@jest/globals';
import { InvalidTransitionError } from '../../src/core/errors.js';
import {
  DutyStatus,
  VALID_TRANSITIONS,
  canTransition,
  createDuty,
  isTerminalStatus,
  transitionDuty,
} from '../../src/duty/lifecycle.js';

const CREATED = '2024-01-01T00:00:00.000Z';
const LATER = '2024-01-31T00:00:00.000Z';

const pending = createDuty({
  id: 'duty-1',
  policyId: 'analytics',
  dataTarget: 'customers',
  retentionPeriod: '30d',
  createdAt: CREATED,
  expiresAt: LATER,
  sourceSequence: 4,
});

describe('Duty Lifecycle', () => {
  describe('createDuty', () => {
    it('should start PENDING with no attempts', () => {
      expect(pending).toEqual({
        id: 'duty-1',
        policyId: 'analytics',
        dataTarget: 'customers',
        retentionPeriod: '30d',
        createdAt: CREATED,
        expiresAt: LATER,
        status: 'PENDING',
        attemptCount: 0,
        sourceSequence: 4,
        updatedAt: CREATED,
      });
    });
  });

  describe('canTransition', () => {
    it('should allow PENDING → IN_PROGRESS only', () => {
      expect(canTransition('PENDING', 'IN_PROGRESS')).toBe(true);
      expect(canTransition('PENDING', 'COMPLETED')).toBe(false);
      expect(canTransition('PENDING', 'FAILED')).toBe(false);
    });

    it('should allow IN_PROGRESS to conclude or go back to PENDING', () => {
      expect(VALID_TRANSITIONS.IN_PROGRESS).toEqual(['COMPLETED', 'FAILED', 'PENDING']);
    });

    it('should allow nothing from terminal states', () => {
      for (const from of [DutyStatus.COMPLETED, DutyStatus.FAILED]) {
        for (const to of Object.values(DutyStatus)) {
          expect(canTransition(from, to)).toBe(false);
        }
      }
    });
  });

  describe('transitionDuty', () => {
    it('should update status and timestamp without mutating the input', () => {
      const running = transitionDuty(pending, DutyStatus.IN_PROGRESS, LATER);

      expect(running.status).toBe('IN_PROGRESS');
      expect(running.updatedAt).toBe(LATER);
      expect(running.concludedAt).toBeUndefined();
      expect(pending.status).toBe('PENDING');
    });

    it('should apply changes and stamp terminal states', () => {
      const running = transitionDuty(pending, DutyStatus.IN_PROGRESS, LATER);
      const done = transitionDuty(running, DutyStatus.COMPLETED, LATER, { attemptCount: 1 });

      expect(done).toMatchObject({ status: 'COMPLETED', attemptCount: 1, concludedAt: LATER });
    });

    it('should record retry details when going back to PENDING', () => {
      const running = transitionDuty(pending, DutyStatus.IN_PROGRESS, LATER);
      const retry = transitionDuty(running, DutyStatus.PENDING, LATER, {
        attemptCount: 1,
        nextAttemptAt: '2024-01-31T00:01:00.000Z',
        lastError: 'timeout',
      });

      expect(retry).toMatchObject({
        status: 'PENDING',
        attemptCount: 1,
        nextAttemptAt: '2024-01-31T00:01:00.000Z',
        lastError: 'timeout',
      });
    });

    it('should reject invalid transitions', () => {
      expect(() => transitionDuty(pending, DutyStatus.COMPLETED, LATER)).toThrow(InvalidTransitionError);
      expect(() => transitionDuty(pending, DutyStatus.COMPLETED, LATER)).toThrow(
        'Invalid duty duty-1 transition: PENDING → COMPLETED. Valid transitions: IN_PROGRESS'
      );
    });

    it('should name no valid transitions from a terminal state', () => {
      const done = transitionDuty(
        transitionDuty(pending, DutyStatus.IN_PROGRESS, LATER),
        DutyStatus.FAILED,
        LATER
      );

      expect(() => transitionDuty(done, DutyStatus.PENDING, LATER)).toThrow(
        'Invalid duty duty-1 transition: FAILED → PENDING. Valid transitions: none'
      );
    });
  });

  describe('isTerminalStatus', () => {
    it('should identify terminal states', () => {
      expect(isTerminalStatus('COMPLETED')).toBe(true);
      expect(isTerminalStatus('FAILED')).toBe(true);
      expect(isTerminalStatus('PENDING')).toBe(false);
      expect(isTerminalStatus('IN_PROGRESS')).toBe(false);
    });
  });
});
