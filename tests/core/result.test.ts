import { AgentError, InternalError, isAgentError, PeerGoneError, toTaskError } from '../../core/errors';
import { asAgentError, settle } from '../../core/result';

describe('settle', () => {
  it('wraps values', async () => {
    await expect(settle(() => 42)).resolves.toEqual({ ok: true, value: 42 });
    await expect(settle(Promise.resolve('done'))).resolves.toEqual({ ok: true, value: 'done' });
  });

  it('keeps domain errors as they are', async () => {
    const error = new PeerGoneError('agent-2');
    const result = await settle(() => {
      throw error;
    });

    expect(result).toEqual({ ok: false, error });
  });

  it('reports other failures as Internal', async () => {
    const result = await settle(Promise.reject(new Error('boom')));

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error.toJSON()).toEqual({ kind: 'Internal', message: 'boom' });
  });
});

describe('asAgentError', () => {
  it('wraps non-errors', () => {
    const error = asAgentError('plain');
    expect(error).toBeInstanceOf(InternalError);
    expect(error.message).toBe('plain');
  });

  it('returns domain errors unchanged', () => {
    const error: AgentError = new PeerGoneError('agent-2');
    expect(asAgentError(error)).toBe(error);
  });
});

describe('isAgentError', () => {
  it('recognises domain errors only', () => {
    expect(isAgentError(new PeerGoneError('agent-2'))).toBe(true);
    expect(isAgentError(new Error('plain'))).toBe(false);
    expect(isAgentError({ kind: 'PeerGone', message: 'agent-2' })).toBe(false);
  });
});

describe('toTaskError', () => {
  it('describes any thrown value', () => {
    expect(toTaskError(new PeerGoneError('agent-2'))).toEqual({ kind: 'PeerGone', message: 'Agent agent-2 is no longer registered' });
    expect(toTaskError(new TypeError('bad'))).toEqual({ kind: 'TypeError', message: 'bad' });
    expect(toTaskError('text')).toEqual({ kind: 'Error', message: 'text' });
  });
});
