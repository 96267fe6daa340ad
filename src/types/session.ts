/** Lifecycle of a logical session slot. */
export type SessionStatus =
    | 'unauthenticated'
    | 'awaiting-code'
    | 'awaiting-password'
    | 'authenticated'
    | 'disconnected'
    | 'error';

/** Everything needed to build a protocol client for a session. */
export interface SessionCredentials {
    name: string;
    apiId: number;
    apiHash: string;
    phone: string;
    /** Opaque export of a previous login; absent for a fresh session. */
    sessionString?: string;
}

/** Read-only view of a session slot for surfaces and the API. */
export interface SessionSnapshot {
    name: string;
    phone: string;
    status: SessionStatus;
    autoRespond: boolean;
    lastError: string | null;
    updatedAt: string;
}
