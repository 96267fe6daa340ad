import {
    deleteSessionRecord,
    listSessionRecords,
    setSessionAutoRespond,
    updateSessionState,
    upsertSessionRecord,
} from './db.js';
import { FatalProtocolError } from '../types/errors.js';
import type { ProtocolClient, ProtocolClientFactory } from '../types/protocol.js';
import type { SessionCredentials, SessionSnapshot, SessionStatus } from '../types/session.js';
import { logThought } from '../utils/logger.js';

interface SessionSlot {
    credentials: SessionCredentials;
    /** Credentials of a re-created session, applied by the next `session-create` job. */
    pending: SessionCredentials | null;
    client: ProtocolClient | null;
    status: SessionStatus;
    autoRespondTemplate: string | null;
    lastError: string | null;
    updatedAt: string;
}

export type SessionChangeListener = (snapshot: SessionSnapshot) => void;

/**
 * Owns one slot per named session and the protocol client inside it.
 *
 * Slot bookkeeping (`register`, `snapshot`, `list`) is synchronous. Methods
 * that talk to the network are meant to be called from work units only, so
 * every client call happens inside the worker runtime.
 */
export class SessionManager {
    readonly #slots: Map<string, SessionSlot> = new Map();
    readonly #listeners: Set<SessionChangeListener> = new Set();
    readonly #factory: ProtocolClientFactory;

    constructor(factory: ProtocolClientFactory) {
        this.#factory = factory;
    }

    /** Rebuild slots from persisted rows. Clients are created lazily on connect. */
    restore(): number {
        for (const row of listSessionRecords()) {
            if (this.#slots.has(row.name)) continue;
            this.#slots.set(row.name, {
                credentials: {
                    name: row.name,
                    apiId: row.api_id,
                    apiHash: row.api_hash,
                    phone: row.phone,
                    sessionString: row.session_string ?? undefined,
                },
                pending: null,
                client: null,
                status: row.session_string ? 'disconnected' : 'unauthenticated',
                autoRespondTemplate: row.auto_respond_template,
                lastError: null,
                updatedAt: new Date().toISOString(),
            });
        }
        return this.#slots.size;
    }

    has(name: string): boolean {
        return this.#slots.has(name);
    }

    status(name: string): SessionStatus | undefined {
        return this.#slots.get(name)?.status;
    }

    snapshot(name: string): SessionSnapshot | undefined {
        const slot = this.#slots.get(name);
        return slot ? toSnapshot(slot) : undefined;
    }

    list(): SessionSnapshot[] {
        return [...this.#slots.values()].map(toSnapshot);
    }

    /** Templates of sessions that had auto-reply switched on when last persisted. */
    savedAutoResponders(): Array<{ name: string; template: string }> {
        const saved: Array<{ name: string; template: string }> = [];
        for (const slot of this.#slots.values()) {
            if (slot.autoRespondTemplate) {
                saved.push({ name: slot.credentials.name, template: slot.autoRespondTemplate });
            }
        }
        return saved;
    }

    /**
     * Create a slot, or queue new credentials for an existing one. Queued
     * credentials leave the live client alone until `applyRegistration` runs
     * inside the session's own job.
     */
    register(credentials: SessionCredentials): SessionSnapshot {
        const existing = this.#slots.get(credentials.name);
        if (existing) {
            existing.pending = { ...credentials };
            return toSnapshot(existing);
        }

        const slot: SessionSlot = {
            credentials: { ...credentials },
            pending: null,
            client: null,
            status: 'unauthenticated',
            autoRespondTemplate: null,
            lastError: null,
            updatedAt: new Date().toISOString(),
        };
        this.#slots.set(credentials.name, slot);

        upsertSessionRecord({
            name: credentials.name,
            apiId: credentials.apiId,
            apiHash: credentials.apiHash,
            phone: credentials.phone,
            sessionString: credentials.sessionString ?? null,
            status: slot.status,
        });
        this.#notify(slot);
        return toSnapshot(slot);
    }

    /**
     * Swap in queued credentials. A stored login survives only when the phone
     * number is unchanged; otherwise the old client is disconnected and the
     * session starts over. Returns false when the login was dropped.
     */
    async applyRegistration(name: string): Promise<boolean> {
        const slot = this.#requireSlot(name);
        const next = slot.pending;
        if (!next) return true;
        slot.pending = null;

        const keepsLogin = next.phone === slot.credentials.phone && slot.credentials.sessionString !== undefined;
        const previous = keepsLogin ? null : slot.client;

        slot.credentials = {
            ...next,
            sessionString: next.sessionString ?? (keepsLogin ? slot.credentials.sessionString : undefined),
        };
        slot.lastError = null;
        slot.updatedAt = new Date().toISOString();
        if (!keepsLogin) {
            slot.client = null;
            slot.status = 'unauthenticated';
        }

        upsertSessionRecord({
            name,
            apiId: next.apiId,
            apiHash: next.apiHash,
            phone: next.phone,
            sessionString: slot.credentials.sessionString ?? null,
            status: slot.status,
        });
        if (!keepsLogin) {
            updateSessionState(name, slot.status, slot.credentials.sessionString ?? null);
        }
        this.#notify(slot);

        if (previous) {
            try {
                await previous.disconnect();
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                console.error(`[SessionManager] Failed to disconnect the replaced client of '${name}':`, message);
            }
            await logThought(`[SessionManager] Session '${name}' switched to ${next.phone}; previous login dropped.`);
        }
        return keepsLogin;
    }

    /** Remove a slot and its persisted record. The client must already be disconnected. */
    forget(name: string): boolean {
        const removed = this.#slots.delete(name);
        deleteSessionRecord(name);
        return removed;
    }

    /** Subscribe to slot changes. Returns an unsubscribe function. */
    onChange(listener: SessionChangeListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    // ── Work-unit operations ────────────────────────────────────────────────

    /** Connect and either restore the login or request a login code. */
    async connect(name: string): Promise<SessionStatus> {
        const slot = this.#requireSlot(name);
        try {
            if (!slot.client) {
                slot.client = this.#factory(slot.credentials);
            }
            await slot.client.connect();

            if (await slot.client.isAuthorized()) {
                this.#setStatus(slot, 'authenticated', slot.client.exportSession());
                await logThought(`[SessionManager] Session '${name}' restored an existing login.`);
            } else {
                await slot.client.sendCodeRequest(slot.credentials.phone);
                this.#setStatus(slot, 'awaiting-code');
                await logThought(`[SessionManager] Login code requested for session '${name}'.`);
            }
            return slot.status;
        } catch (err) {
            this.#markError(slot, err);
            throw err;
        }
    }

    /** Complete a login with the received code, and the 2FA password when asked. */
    async authorize(name: string, code: string, password?: string): Promise<SessionStatus> {
        const slot = this.#requireSlot(name);
        const client = slot.client;
        if (!client) {
            throw new FatalProtocolError(`Session '${name}' has no connection; create it again.`);
        }

        try {
            const outcome = await client.signIn(code, password);
            if (outcome === 'password-required') {
                this.#setStatus(slot, 'awaiting-password');
                await logThought(`[SessionManager] Session '${name}' requires its two-step password.`);
            } else {
                this.#setStatus(slot, 'authenticated', client.exportSession());
                await logThought(`[SessionManager] Session '${name}' authorized.`);
            }
            return slot.status;
        } catch (err) {
            // A wrong code leaves the session waiting for another attempt.
            slot.lastError = err instanceof Error ? err.message : String(err);
            slot.updatedAt = new Date().toISOString();
            this.#notify(slot);
            throw err;
        }
    }

    async disconnect(name: string): Promise<SessionStatus> {
        const slot = this.#requireSlot(name);
        const client = slot.client;
        slot.client = null;
        if (client) {
            await client.disconnect();
        }
        this.#setStatus(slot, 'disconnected');
        return slot.status;
    }

    /** The client of an authenticated session, for read and send operations. */
    requireClient(name: string): ProtocolClient {
        const slot = this.#requireSlot(name);
        if (slot.status !== 'authenticated' || !slot.client) {
            throw new FatalProtocolError(`Session '${name}' is not authenticated (status: ${slot.status}).`);
        }
        return slot.client;
    }

    setAutoRespondTemplate(name: string, template: string | null): void {
        const slot = this.#requireSlot(name);
        slot.autoRespondTemplate = template;
        setSessionAutoRespond(name, template);
        this.#notify(slot);
    }

    /** Disconnect every live client. Failures are logged, never thrown. */
    async disconnectAll(): Promise<void> {
        for (const slot of this.#slots.values()) {
            const client = slot.client;
            if (!client) continue;
            slot.client = null;
            try {
                await client.disconnect();
                this.#setStatus(slot, 'disconnected');
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                console.error(`[SessionManager] Failed to disconnect '${slot.credentials.name}':`, message);
                await logThought(`[SessionManager] Failed to disconnect '${slot.credentials.name}': ${message}`);
            }
        }
    }

    // ── Private Helpers ──────────────────────────────────────────────────────

    #requireSlot(name: string): SessionSlot {
        const slot = this.#slots.get(name);
        if (!slot) {
            throw new FatalProtocolError(`Session '${name}' not found.`);
        }
        return slot;
    }

    #setStatus(slot: SessionSlot, status: SessionStatus, sessionString?: string): void {
        slot.status = status;
        slot.lastError = null;
        slot.updatedAt = new Date().toISOString();
        if (sessionString !== undefined) {
            slot.credentials = { ...slot.credentials, sessionString };
        }
        updateSessionState(slot.credentials.name, status, sessionString);
        this.#notify(slot);
    }

    #markError(slot: SessionSlot, err: unknown): void {
        slot.status = 'error';
        slot.lastError = err instanceof Error ? err.message : String(err);
        slot.updatedAt = new Date().toISOString();
        updateSessionState(slot.credentials.name, 'error');
        this.#notify(slot);
    }

    #notify(slot: SessionSlot): void {
        const snapshot = toSnapshot(slot);
        for (const listener of this.#listeners) {
            try {
                listener(snapshot);
            } catch (listenerErr) {
                console.error('[SessionManager] Change listener threw an error:', listenerErr);
            }
        }
    }
}

function toSnapshot(slot: SessionSlot): SessionSnapshot {
    return Object.freeze({
        name: slot.credentials.name,
        phone: slot.credentials.phone,
        status: slot.status,
        autoRespond: slot.autoRespondTemplate !== null,
        lastError: slot.lastError,
        updatedAt: slot.updatedAt,
    });
}
