import { AttemptRecorder, canTransition } from '../attemptRecorder';
import { EngineError, InvalidTransitionError } from '../errors';
import type { AttemptTransition } from '../../../types/bypass';

describe('AttemptRecorder', () => {
  it('starts Pending with a namespaced id', () => {
    const recorder = new AttemptRecorder('read-setup', 1);

    expect(recorder.status).toBe('Pending');
    expect(recorder.isTerminal).toBe(false);
    expect(recorder.id).toMatch(/^attempt_[0-9a-f-]{36}$/);
  });

  it('walks the happy path and reports every transition', () => {
    const seen: Array<[AttemptTransition, string]> = [];
    const recorder = new AttemptRecorder('read-setup', 1, (transition, methodName) => seen.push([transition, methodName]));

    recorder.transition('Preparing');
    recorder.transition('Executing');
    recorder.stepCompleted('setup');
    recorder.transition('Verifying');
    recorder.verification('lock state Unlocked');
    recorder.transition('Success');

    const attempt = recorder.finish();
    expect(attempt.status).toBe('Success');
    expect(attempt.completedSteps).toEqual(['setup']);
    expect(seen.map(([transition]) => `${transition.from}>${transition.to}`)).toEqual([
      'Pending>Preparing',
      'Preparing>Executing',
      'Executing>Verifying',
      'Verifying>Success'
    ]);
    expect(seen.every(([, methodName]) => methodName === 'read-setup')).toBe(true);
    expect(attempt.log.map(entry => entry.message)).toContain('verification: lock state Unlocked');
  });

  it('rejects skipping a phase', () => {
    const recorder = new AttemptRecorder('read-setup', 1);

    expect(() => recorder.transition('Executing')).toThrow(InvalidTransitionError);
    expect(recorder.status).toBe('Pending');
  });

  it('refuses Success without a verification read', () => {
    const recorder = new AttemptRecorder('read-setup', 1);
    recorder.transition('Preparing');
    recorder.transition('Executing');
    recorder.stepCompleted('setup');
    recorder.transition('Verifying');

    expect(() => recorder.transition('Success')).toThrow(InvalidTransitionError);
  });

  it('refuses Success when no step completed', () => {
    const recorder = new AttemptRecorder('read-setup', 1);
    recorder.transition('Preparing');
    recorder.transition('Executing');
    recorder.transition('Verifying');
    recorder.verification('lock state Unlocked');

    expect(() => recorder.transition('Success')).toThrow(InvalidTransitionError);
  });

  it('keeps failure details on the finished attempt', () => {
    const recorder = new AttemptRecorder('read-setup', 2);
    recorder.transition('Preparing');
    recorder.fail('Error', {
      message: 'cmd timed out',
      category: 'timeout',
      errorName: 'CommunicationTimeoutError',
      errorCode: 'COMMUNICATION_TIMEOUT'
    });

    const attempt = recorder.finish();
    expect(attempt).toMatchObject({
      attemptNumber: 2,
      status: 'Error',
      errorMessage: 'cmd timed out',
      errorCategory: 'timeout',
      errorName: 'CommunicationTimeoutError',
      errorCode: 'COMMUNICATION_TIMEOUT'
    });
    expect(attempt.transitions[1].detail).toBe('cmd timed out');
  });

  it('freezes the attempt and blocks further transitions', () => {
    const recorder = new AttemptRecorder('read-setup', 1);
    recorder.transition('Preparing');
    recorder.fail('Failed', { message: 'connectivity probe failed' });

    const attempt = recorder.finish();
    expect(Object.isFrozen(attempt)).toBe(true);
    expect(Object.isFrozen(attempt.transitions)).toBe(true);
    expect(() => recorder.transition('Executing')).toThrow(InvalidTransitionError);
  });

  it('cannot finish while still running', () => {
    const recorder = new AttemptRecorder('read-setup', 1);
    recorder.transition('Preparing');

    expect(() => recorder.finish()).toThrow(EngineError);
  });

  describe('canTransition', () => {
    it.each([
      ['Pending', 'Preparing', true],
      ['Preparing', 'Failed', true],
      ['Executing', 'Error', true],
      ['Verifying', 'Success', true],
      ['Pending', 'Failed', false],
      ['Preparing', 'Success', false],
      ['Success', 'Preparing', false],
      ['Failed', 'Error', false]
    ] as const)('%s -> %s is %s', (from, to, allowed) => {
      expect(canTransition(from, to)).toBe(allowed);
    });
  });
});
