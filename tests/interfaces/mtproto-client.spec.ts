import { describe, expect, it } from 'vitest';
import { mapProtocolError } from '../../src/interfaces/mtproto_client.js';
import { FatalProtocolError, TransientProtocolError } from '../../src/types/errors.js';

function rpcError(errorMessage: string, code?: number, seconds?: number): Error & { errorMessage: string; code?: number; seconds?: number } {
  return Object.assign(new Error(errorMessage), { errorMessage, code, seconds });
}

describe('mapProtocolError', () => {
  it('turns a flood wait into a transient error carrying the delay', () => {
    const mapped = mapProtocolError(rpcError('FLOOD_WAIT_30', 420), 'sendMessage');

    expect(mapped).toBeInstanceOf(TransientProtocolError);
    expect(mapped.message).toBe('sendMessage hit a flood wait of 30s.');
    expect(mapped instanceof TransientProtocolError && mapped.retryAfterMs).toBe(30_000);
  });

  it('prefers the seconds field the library parsed', () => {
    const mapped = mapProtocolError(rpcError('FLOOD_PREMIUM_WAIT_5', 420, 7), 'getParticipants');

    expect(mapped instanceof TransientProtocolError && mapped.retryAfterMs).toBe(7_000);
  });

  it('treats client-side RPC codes as fatal', () => {
    const mapped = mapProtocolError(rpcError('CHAT_ADMIN_REQUIRED', 400), 'inviteToChat');

    expect(mapped).toBeInstanceOf(FatalProtocolError);
    expect(mapped.message).toBe('inviteToChat failed: CHAT_ADMIN_REQUIRED');
    expect(mapped instanceof FatalProtocolError && mapped.code).toBe('CHAT_ADMIN_REQUIRED');
  });

  it('treats revoked or banned accounts as fatal regardless of code', () => {
    expect(mapProtocolError(rpcError('AUTH_KEY_UNREGISTERED'), 'connect')).toBeInstanceOf(FatalProtocolError);
    expect(mapProtocolError(rpcError('SESSION_REVOKED', 500), 'connect')).toBeInstanceOf(FatalProtocolError);
  });

  it('keeps server-side RPC failures and plain errors transient', () => {
    expect(mapProtocolError(rpcError('RPC_CALL_FAIL', 500), 'getDialogs')).toBeInstanceOf(TransientProtocolError);

    const plain = mapProtocolError(new Error('socket hang up'), 'connect');
    expect(plain).toBeInstanceOf(TransientProtocolError);
    expect(plain.message).toBe('connect failed: socket hang up');
  });

  it('passes already-classified errors through', () => {
    const fatal = new FatalProtocolError('already mapped');
    expect(mapProtocolError(fatal, 'connect')).toBe(fatal);
  });
});
