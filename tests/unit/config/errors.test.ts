import { describe, it, expect } from 'vitest';
import { Err } from '../../../src/errors/factories.js';
import { describeCause, formatAppError } from '../../../src/errors/index.js';

describe('formatAppError', () => {
  it('should include the phase and cause of a startup failure', () => {
    const error = Err.startupFailed('container', 'Could not build the task dependencies', new Error('no region'));

    expect(formatAppError(error)).toBe(
      'Startup failed during container: Could not build the task dependencies\nCause: Error: no region'
    );
  });

  it('should explain an undelivered callback', () => {
    const error = Err.callbackUndelivered('send_task_success', 'TaskDoesNotExist');

    expect(formatAppError(error)).toBe(
      'Step Functions send_task_success call failed; the execution will wait for its own timeout\nCause: TaskDoesNotExist'
    );
  });

  it('should list no details for an empty issue list', () => {
    expect(formatAppError(Err.configInvalid([]))).toBe('Invalid task configuration\n\n  - (no details)');
  });
});

describe('describeCause', () => {
  it('should render errors, strings and values', () => {
    expect(describeCause(new TypeError('bad'))).toBe('TypeError: bad');
    expect(describeCause('text')).toBe('text');
    expect(describeCause({ status: 500 })).toBe('{"status":500}');
    expect(describeCause(undefined)).toBe('undefined');
  });
});
