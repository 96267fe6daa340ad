import { Api, TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions/index.js';
import { NewMessage, type NewMessageEvent } from 'telegram/events/index.js';
import bigInt from 'big-integer';
import { FatalProtocolError, TransientProtocolError } from '../types/errors.js';
import type {
    IncomingMessageHandler,
    ProtocolClient,
    ProtocolClientFactory,
    ProtocolDialog,
    ProtocolUser,
    SignInOutcome,
} from '../types/protocol.js';
import type { SessionCredentials } from '../types/session.js';

const CONNECTION_RETRIES = 5;

/** RPC codes that never succeed on a retry. */
const FATAL_RPC_CODES = new Set([400, 401, 403, 406]);

const FATAL_RPC_PREFIXES = ['AUTH_KEY', 'USER_DEACTIVATED', 'PHONE_NUMBER_BANNED', 'SESSION_REVOKED'];

interface RpcLikeError {
    errorMessage: string;
    code?: number;
    seconds?: number;
}

function isRpcLikeError(error: unknown): error is RpcLikeError {
    return typeof error === 'object'
        && error !== null
        && 'errorMessage' in error
        && typeof error.errorMessage === 'string';
}

function floodSeconds(error: RpcLikeError): number | null {
    if (typeof error.seconds === 'number') return error.seconds;
    const match = /^FLOOD_(?:PREMIUM_)?WAIT_(\d+)$/.exec(error.errorMessage);
    return match ? Number(match[1]) : null;
}

/**
 * Translate a client library error into the transient/fatal taxonomy.
 * Flood waits carry the server-requested delay so retry honors it.
 */
export function mapProtocolError(error: unknown, operation: string): TransientProtocolError | FatalProtocolError {
    if (error instanceof TransientProtocolError || error instanceof FatalProtocolError) {
        return error;
    }

    if (isRpcLikeError(error)) {
        const seconds = floodSeconds(error);
        if (seconds !== null || error.code === 420) {
            return new TransientProtocolError(
                `${operation} hit a flood wait${seconds !== null ? ` of ${seconds}s` : ''}.`,
                { cause: error, retryAfterMs: seconds !== null ? seconds * 1000 : undefined },
            );
        }

        const fatal = FATAL_RPC_PREFIXES.some((prefix) => error.errorMessage.startsWith(prefix))
            || (error.code !== undefined && FATAL_RPC_CODES.has(error.code));
        if (fatal) {
            return new FatalProtocolError(`${operation} failed: ${error.errorMessage}`, {
                cause: error,
                code: error.errorMessage,
            });
        }
        return new TransientProtocolError(`${operation} failed: ${error.errorMessage}`, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransientProtocolError(`${operation} failed: ${message}`, { cause: error });
}

/** Numeric ids become big integers; usernames, phones and links pass through. */
function toEntity(target: string): string | bigInt.BigInteger {
    return /^-?\d+$/.test(target) ? bigInt(target) : target;
}

function toUser(user: Api.User): ProtocolUser {
    return {
        id: user.id.toString(),
        username: user.username ?? null,
        firstName: user.firstName ?? null,
        lastName: user.lastName ?? null,
        phone: user.phone ?? null,
        bot: user.bot ?? false,
    };
}

/** `ProtocolClient` backed by an MTProto user-account connection. */
export class MtprotoClient implements ProtocolClient {
    readonly #credentials: SessionCredentials;
    readonly #session: StringSession;
    readonly #client: TelegramClient;
    readonly #handlers: Map<IncomingMessageHandler, (event: NewMessageEvent) => Promise<void>> = new Map();
    #phoneCodeHash: string | null = null;
    #passwordPending = false;

    constructor(credentials: SessionCredentials, client?: TelegramClient) {
        this.#credentials = credentials;
        this.#session = new StringSession(credentials.sessionString ?? '');
        this.#client = client ?? new TelegramClient(this.#session, credentials.apiId, credentials.apiHash, {
            connectionRetries: CONNECTION_RETRIES,
        });
    }

    async connect(): Promise<void> {
        await this.#call('Connect', async () => {
            await this.#client.connect();
        });
    }

    async isAuthorized(): Promise<boolean> {
        return this.#call('Authorization check', () => this.#client.checkAuthorization());
    }

    async sendCodeRequest(phone: string): Promise<void> {
        const { phoneCodeHash } = await this.#call('Code request', () =>
            this.#client.sendCode(this.#apiCredentials(), phone),
        );
        this.#phoneCodeHash = phoneCodeHash;
        this.#passwordPending = false;
    }

    async signIn(code: string, password?: string): Promise<SignInOutcome> {
        if (this.#passwordPending) {
            return this.#signInWithPassword(password);
        }

        const phoneCodeHash = this.#phoneCodeHash;
        if (phoneCodeHash === null) {
            throw new FatalProtocolError('Sign-in attempted before a login code was requested.');
        }

        try {
            const result = await this.#client.invoke(new Api.auth.SignIn({
                phoneNumber: this.#credentials.phone,
                phoneCodeHash,
                phoneCode: code,
            }));
            if (result instanceof Api.auth.AuthorizationSignUpRequired) {
                throw new FatalProtocolError(`Phone ${this.#credentials.phone} has no account; sign-up is not supported.`);
            }
            return 'authorized';
        } catch (err) {
            if (isRpcLikeError(err) && err.errorMessage === 'SESSION_PASSWORD_NEEDED') {
                this.#passwordPending = true;
                return this.#signInWithPassword(password);
            }
            throw mapProtocolError(err, 'Sign-in');
        }
    }

    async sendMessage(target: string, text: string): Promise<void> {
        await this.#call('Send message', async () => {
            await this.#client.sendMessage(toEntity(target), { message: text });
        });
    }

    async getParticipants(chat: string, limit: number): Promise<ProtocolUser[]> {
        const users = await this.#call('Participant listing', () =>
            this.#client.getParticipants(toEntity(chat), { limit }),
        );
        return users.map(toUser);
    }

    async getDialogs(limit: number): Promise<ProtocolDialog[]> {
        const dialogs = await this.#call('Dialog listing', () => this.#client.getDialogs({ limit }));
        return dialogs.map((dialog) => ({
            id: dialog.id?.toString() ?? '',
            title: dialog.title ?? '',
            isUser: dialog.isUser,
            isGroup: dialog.isGroup,
            isChannel: dialog.isChannel,
            unreadCount: dialog.unreadCount,
        }));
    }

    async checkPhone(phone: string): Promise<boolean> {
        try {
            const resolved = await this.#client.invoke(new Api.contacts.ResolvePhone({ phone }));
            return resolved.users.length > 0;
        } catch (err) {
            if (isRpcLikeError(err) && err.errorMessage === 'PHONE_NOT_OCCUPIED') {
                return false;
            }
            throw mapProtocolError(err, 'Phone lookup');
        }
    }

    async inviteToChat(chat: string, user: string): Promise<void> {
        await this.#call('Invite', async () => {
            await this.#client.invoke(new Api.channels.InviteToChannel({
                channel: toEntity(chat),
                users: [toEntity(user)],
            }));
        });
    }

    onIncomingMessage(handler: IncomingMessageHandler): () => void {
        const filter = new NewMessage({ incoming: true });
        const callback = async (event: NewMessageEvent): Promise<void> => {
            await handler({
                senderId: event.message.senderId?.toString() ?? '',
                chatId: event.chatId?.toString() ?? '',
                text: event.message.message,
                isPrivate: event.isPrivate ?? false,
                reply: async (text: string) => {
                    await this.#call('Reply', async () => {
                        await event.message.respond({ message: text });
                    });
                },
            });
        };

        this.#client.addEventHandler(callback, filter);
        this.#handlers.set(handler, callback);

        return () => {
            this.#client.removeEventHandler(callback, filter);
            this.#handlers.delete(handler);
        };
    }

    exportSession(): string {
        return this.#session.save();
    }

    async disconnect(): Promise<void> {
        this.#handlers.clear();
        await this.#call('Disconnect', () => this.#client.disconnect());
    }

    // ── Private Helpers ──────────────────────────────────────────────────────

    #apiCredentials(): { apiId: number; apiHash: string } {
        return { apiId: this.#credentials.apiId, apiHash: this.#credentials.apiHash };
    }

    async #signInWithPassword(password: string | undefined): Promise<SignInOutcome> {
        if (!password) {
            return 'password-required';
        }

        await this.#call('Password sign-in', async () => {
            await this.#client.signInWithPassword(this.#apiCredentials(), {
                password: async () => password,
                onError: async (err: Error) => {
                    throw err;
                },
            });
        });
        this.#passwordPending = false;
        return 'authorized';
    }

    async #call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (err) {
            throw mapProtocolError(err, operation);
        }
    }
}

export function createMtprotoClientFactory(): ProtocolClientFactory {
    return (credentials) => new MtprotoClient(credentials);
}
