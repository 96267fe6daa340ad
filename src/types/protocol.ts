import type { SessionCredentials } from './session.js';

export interface ProtocolUser {
    id: string;
    username: string | null;
    firstName: string | null;
    lastName: string | null;
    phone: string | null;
    bot: boolean;
}

export interface ProtocolDialog {
    id: string;
    title: string;
    isUser: boolean;
    isGroup: boolean;
    isChannel: boolean;
    unreadCount: number;
}

export interface InboundMessage {
    senderId: string;
    chatId: string;
    text: string;
    isPrivate: boolean;
    /** Replies in the same conversation as the incoming message. */
    reply(text: string): Promise<void>;
}

export type IncomingMessageHandler = (message: InboundMessage) => Promise<void> | void;

export type SignInOutcome = 'authorized' | 'password-required';

/**
 * Capability surface of an account-level messaging client.
 * Only the worker runtime ever calls these methods.
 */
export interface ProtocolClient {
    connect(): Promise<void>;
    isAuthorized(): Promise<boolean>;
    sendCodeRequest(phone: string): Promise<void>;
    signIn(code: string, password?: string): Promise<SignInOutcome>;
    sendMessage(target: string, text: string): Promise<void>;
    getParticipants(chat: string, limit: number): Promise<ProtocolUser[]>;
    getDialogs(limit: number): Promise<ProtocolDialog[]>;
    checkPhone(phone: string): Promise<boolean>;
    inviteToChat(chat: string, user: string): Promise<void>;
    /** Subscribe to incoming messages; returns the unsubscribe function. */
    onIncomingMessage(handler: IncomingMessageHandler): () => void;
    /** Opaque string that restores this login through the factory. */
    exportSession(): string;
    disconnect(): Promise<void>;
}

export type ProtocolClientFactory = (credentials: SessionCredentials) => ProtocolClient;
