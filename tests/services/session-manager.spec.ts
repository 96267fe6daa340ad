import { beforeEach, describe, expect, it } from 'vitest';
import { SessionManager } from '../../src/services/session-manager.js';
import { db, getSessionRecord } from '../../src/services/db.js';
import { FatalProtocolError } from '../../src/types/errors.js';
import type { SessionSnapshot } from '../../src/types/session.js';
import { createFakeFactory } from '../harness/fake-protocol-client.js';

const credentials = { name: 'main', apiId: 12345, apiHash: 'test-hash', phone: '+15550001111' };

describe('SessionManager', () => {
  beforeEach(() => {
    db.exec('DELETE FROM sessions');
  });

  it('registers a slot synchronously and persists it', () => {
    const { factory } = createFakeFactory();
    const sessions = new SessionManager(factory);

    const snapshot = sessions.register(credentials);

    expect(snapshot).toMatchObject({ name: 'main', phone: '+15550001111', status: 'unauthenticated', autoRespond: false });
    expect(sessions.has('main')).toBe(true);
    expect(getSessionRecord('main')?.status).toBe('unauthenticated');
  });

  it('queues new credentials of an existing slot until the create job applies them', async () => {
    const { factory, clients } = createFakeFactory();
    const sessions = new SessionManager(factory);
    sessions.register(credentials);
    await sessions.connect('main');
    await sessions.authorize('main', '12345');
    const first = clients.get('main');

    const queued = sessions.register({ ...credentials, phone: '+15559998888' });
    expect(queued).toMatchObject({ phone: '+15550001111', status: 'authenticated' });
    expect(first?.connected).toBe(true);

    await expect(sessions.applyRegistration('main')).resolves.toBe(false);
    expect(sessions.snapshot('main')).toMatchObject({ phone: '+15559998888', status: 'unauthenticated' });
    expect(first?.connected).toBe(false);
    expect(() => sessions.requireClient('main')).toThrow(FatalProtocolError);
  });

  it('requests a login code when the account is not authorized yet', async () => {
    const { factory, clients } = createFakeFactory();
    const sessions = new SessionManager(factory);
    sessions.register(credentials);

    await expect(sessions.connect('main')).resolves.toBe('awaiting-code');
    expect(clients.get('main')?.calls).toContain('sendCodeRequest:+15550001111');
  });

  it('walks the code and password steps to authenticated', async () => {
    const { factory } = createFakeFactory({ requirePassword: true });
    const sessions = new SessionManager(factory);
    sessions.register(credentials);
    await sessions.connect('main');

    await expect(sessions.authorize('main', '12345')).resolves.toBe('awaiting-password');
    await expect(sessions.authorize('main', '12345', 'test-password')).resolves.toBe('authenticated');
    expect(getSessionRecord('main')?.session_string).toBe('session-for-main');
  });

  it('keeps waiting for a code after a rejected one', async () => {
    const { factory } = createFakeFactory({ validCode: '11111' });
    const sessions = new SessionManager(factory);
    sessions.register(credentials);
    await sessions.connect('main');

    await expect(sessions.authorize('main', '99999')).rejects.toThrow('PHONE_CODE_INVALID');
    expect(sessions.snapshot('main')).toMatchObject({ status: 'awaiting-code', lastError: 'PHONE_CODE_INVALID' });
  });

  it('restores slots from the database with their stored login', async () => {
    const { factory } = createFakeFactory();
    const first = new SessionManager(factory);
    first.register({ ...credentials, sessionString: 'stored-login' });

    const restored = new SessionManager(factory);
    expect(restored.restore()).toBe(1);
    expect(restored.status('main')).toBe('disconnected');
    await expect(restored.connect('main')).resolves.toBe('authenticated');
  });

  it('refuses the client of a session that is not authenticated', () => {
    const { factory } = createFakeFactory();
    const sessions = new SessionManager(factory);
    sessions.register(credentials);

    expect(() => sessions.requireClient('main')).toThrow(FatalProtocolError);
    expect(() => sessions.requireClient('ghost')).toThrow("Session 'ghost' not found.");
  });

  it('announces every change to subscribers', async () => {
    const { factory } = createFakeFactory();
    const sessions = new SessionManager(factory);
    const seen: SessionSnapshot[] = [];
    sessions.onChange((snapshot) => seen.push(snapshot));

    sessions.register(credentials);
    await sessions.connect('main');
    sessions.setAutoRespondTemplate('main', 'Back soon');

    expect(seen.map((snapshot) => snapshot.status)).toEqual(['unauthenticated', 'awaiting-code', 'awaiting-code']);
    expect(seen[2].autoRespond).toBe(true);
    expect(sessions.savedAutoResponders()).toEqual([{ name: 'main', template: 'Back soon' }]);
  });

  it('disconnects every live client', async () => {
    const { factory, clients } = createFakeFactory({ authorized: true });
    const sessions = new SessionManager(factory);
    sessions.register(credentials);
    sessions.register({ ...credentials, name: 'second' });
    await sessions.connect('main');
    await sessions.connect('second');

    await sessions.disconnectAll();

    expect(clients.get('main')?.connected).toBe(false);
    expect(clients.get('second')?.connected).toBe(false);
    expect(sessions.list().map((session) => session.status)).toEqual(['disconnected', 'disconnected']);
  });

  it('forgets a slot and its record', () => {
    const { factory } = createFakeFactory();
    const sessions = new SessionManager(factory);
    sessions.register(credentials);

    expect(sessions.forget('main')).toBe(true);
    expect(sessions.has('main')).toBe(false);
    expect(getSessionRecord('main')).toBeUndefined();
  });
});
