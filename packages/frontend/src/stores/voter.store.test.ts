import { describe, it, expect, beforeEach } from 'vitest';
import { createVoterToken, useVoterStore } from './voter.store';

describe('voter store', () => {
  beforeEach(() => {
    useVoterStore.setState({ name: '', token: 'token-a' });
  });

  it('creates distinct tokens', () => {
    expect(createVoterToken()).not.toBe(createVoterToken());
  });

  it('creates url-safe nanoid tokens', () => {
    expect(createVoterToken()).toMatch(/^[A-Za-z0-9_-]{21}$/);
  });

  it('updates the display name', () => {
    useVoterStore.getState().setName('Ana');

    expect(useVoterStore.getState().name).toBe('Ana');
    expect(useVoterStore.getState().token).toBe('token-a');
  });

  it('issues a fresh token for a new session and keeps the name', () => {
    useVoterStore.getState().setName('Ana');
    useVoterStore.getState().startNewSession();

    const state = useVoterStore.getState();
    expect(state.token).not.toBe('token-a');
    expect(state.name).toBe('Ana');
  });

  it('can rename while starting a new session', () => {
    useVoterStore.getState().startNewSession('Group 3');

    expect(useVoterStore.getState().name).toBe('Group 3');
  });

  it('persists name and token to localStorage', () => {
    useVoterStore.getState().setName('Ana');

    const raw = localStorage.getItem('class-vote-voter');
    expect(raw).not.toBeNull();
    expect(JSON.parse(raw ?? '{}')).toEqual({ state: { name: 'Ana', token: 'token-a' }, version: 0 });
  });
});
