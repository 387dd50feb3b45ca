import { describe, it, expect } from 'vitest';
import { Cause, Exit, FiberId, Option } from 'effect';
import {
  describe as describeOutcome,
  environmentFailure,
  failureValue,
  fromExit,
  isFailure,
  isSuccess,
  match,
  success,
} from './outcome';
import { CleanupFailure, CleanupToken } from '../context/cleanup-registry';
import { CancellationError, EnvironmentError } from '../errors';

const cleanupFailure = new CleanupFailure({
  token: CleanupToken(1),
  label: 'close-file',
  message: 'disk gone',
  cause: Cause.fail('disk gone'),
});

describe('Outcome', () => {
  it('should convert a successful exit', () => {
    const outcome = fromExit(Exit.succeed(42), [cleanupFailure]);

    expect(isSuccess(outcome)).toBe(true);
    expect(outcome).toMatchObject({ _tag: 'Success', value: 42 });
    expect(outcome.cleanupFailures).toEqual([cleanupFailure]);
  });

  it('should classify a typed failure as HandlerFailure', () => {
    const outcome = fromExit(Exit.fail(new Error('not found')), []);

    expect(isFailure(outcome)).toBe(true);
    expect(outcome).toMatchObject({
      _tag: 'Failure',
      kind: 'HandlerFailure',
      message: 'not found',
    });
  });

  it('should classify a defect as HandlerFailure', () => {
    const outcome = fromExit(Exit.die(new TypeError('bad access')), []);

    expect(outcome).toMatchObject({ kind: 'HandlerFailure', message: 'bad access' });
  });

  it('should classify CancellationError as CancellationFailure', () => {
    const error = new CancellationError({
      reason: 'timeout',
      message: 'Handler timed out after 5ms',
    });
    const outcome = fromExit(Exit.fail(error), []);

    expect(outcome).toMatchObject({
      kind: 'CancellationFailure',
      message: 'Handler timed out after 5ms',
    });
    expect(failureValue(outcome)).toEqual(Option.some(error));
  });

  it('should classify interruption as CancellationFailure', () => {
    const outcome = fromExit(Exit.interrupt(FiberId.none), []);

    expect(outcome).toMatchObject({
      kind: 'CancellationFailure',
      message: 'Handler was interrupted',
    });
    expect(
      Option.map(failureValue(outcome), (error) =>
        error instanceof CancellationError ? error.reason : 'other'
      )
    ).toEqual(Option.some('interrupted'));
  });

  it('should classify interruption with a dying finalizer as CancellationFailure', () => {
    const cause = Cause.sequential(
      Cause.interrupt(FiberId.none),
      Cause.die(new Error('finalizer crashed'))
    );
    const outcome = fromExit(Exit.failCause(cause), []);

    expect(outcome).toMatchObject({
      kind: 'CancellationFailure',
      message: 'Handler was interrupted',
    });
    expect(
      isFailure(outcome) &&
        Option.isSome(Cause.dieOption(outcome.cause)) &&
        Cause.isInterrupted(outcome.cause)
    ).toBe(true);
  });

  it('should report a typed failure alongside interruption as HandlerFailure', () => {
    const cause = Cause.parallel(
      Cause.fail(new Error('query failed')),
      Cause.interrupt(FiberId.none)
    );
    const outcome = fromExit(Exit.failCause(cause), []);

    expect(outcome).toMatchObject({
      kind: 'HandlerFailure',
      message: 'query failed',
    });
  });

  it('should build an EnvironmentFailure', () => {
    const error = new EnvironmentError({ message: 'Invalid request: path' });
    const outcome = environmentFailure(error);

    expect(outcome.kind).toBe('EnvironmentFailure');
    expect(outcome.message).toBe('Invalid request: path');
    expect(outcome.cleanupFailures).toEqual([]);
  });

  it('should match on both variants', () => {
    const render = match(success('ok'), {
      onSuccess: ({ value }) => `value ${value}`,
      onFailure: ({ kind }) => kind,
    });
    const failed = match(fromExit(Exit.fail('nope'), []), {
      onSuccess: () => 'value',
      onFailure: ({ kind }) => kind,
    });

    expect(render).toBe('value ok');
    expect(failed).toBe('HandlerFailure');
  });

  it('should describe outcomes in one line', () => {
    expect(describeOutcome(success(1))).toBe('Success');
    expect(describeOutcome(fromExit(Exit.fail('nope'), [cleanupFailure]))).toBe(
      'HandlerFailure: nope; cleanup failures: close-file (disk gone)'
    );
  });
});
