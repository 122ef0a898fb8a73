import {
  ConfigurationError,
  InvalidRoutingDecisionError,
  StepBudgetExceededError,
  ToolTimeoutError,
  extractErrorMessage,
  toError,
} from '../errors';

describe('errors', () => {
  it('describes an invalid routing decision', () => {
    const error = new InvalidRoutingDecisionError('Nobody', ['FINISH', 'Search']);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.name).toBe('InvalidRoutingDecisionError');
    expect(error.message).toBe(
      'Invalid routing decision "Nobody"; expected one of: FINISH, Search'
    );
    expect(new InvalidRoutingDecisionError(undefined, ['FINISH']).message).toBe(
      'Invalid routing decision undefined; expected one of: FINISH'
    );
  });

  it('keeps the cause of an exhausted step budget', () => {
    const cause = new Error('Recursion limit of 4 reached');
    const error = new StepBudgetExceededError(4, cause);
    expect(error.limit).toBe(4);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe(
      'Graph did not converge: step budget of 4 exhausted before FINISH'
    );
  });

  it('names the tool that timed out', () => {
    expect(new ToolTimeoutError('read_document', 50).message).toBe(
      'Tool "read_document" timed out after 50ms'
    );
  });

  it('extracts messages from unknown values', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage('plain')).toBe('plain');
    expect(extractErrorMessage({ message: 'from object' })).toBe('from object');
    expect(extractErrorMessage({ error: { message: 'nested' } })).toBe('nested');
    expect(extractErrorMessage({ code: 42 })).toBe('{"code":42}');
    expect(extractErrorMessage(undefined)).toBe('');
  });

  it('normalises thrown values to Error', () => {
    const original = new Error('kept');
    expect(toError(original)).toBe(original);
    expect(toError('wrapped').message).toBe('wrapped');
  });
});
