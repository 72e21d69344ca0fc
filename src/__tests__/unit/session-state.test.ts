import { describe, it, expect } from 'vitest';
import { SessionState } from '../../core/session-state.js';

describe('SessionState', () => {
  it('starts idle with empty strings', () => {
    const session = new SessionState();

    expect(session.state).toBe('idle');
    expect(session.lastSubmittedCode).toBe('');
    expect(session.lastStoreContents).toBe('');
  });

  it('records submitted code without leaving idle', () => {
    const session = new SessionState();
    session.submit('Nil');

    expect(session.lastSubmittedCode).toBe('Nil');
    expect(session.lastStoreContents).toBe('');
    expect(session.state).toBe('idle');
  });

  it('moves to has-result once a result is recorded', () => {
    const session = new SessionState();
    session.submit('x!(1)');
    session.complete('@{x}!(1)');

    expect(session.state).toBe('has-result');
    expect(session.lastStoreContents).toBe('@{x}!(1)');
  });

  it('stays in has-result and overwrites on later submissions', () => {
    const session = new SessionState();
    session.submit('a');
    session.complete('A');
    session.submit('b');

    expect(session.state).toBe('has-result');
    expect(session.lastSubmittedCode).toBe('b');
    expect(session.lastStoreContents).toBe('A');

    session.complete('B');
    expect(session.lastStoreContents).toBe('B');
  });

  it('keeps separate state per instance', () => {
    const first = new SessionState();
    const second = new SessionState();
    first.submit('only here');

    expect(second.lastSubmittedCode).toBe('');
  });
});
