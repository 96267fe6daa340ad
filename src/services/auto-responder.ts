import type { RateLimiter } from './rate-limiter.js';
import type { InboundMessage, ProtocolClient } from '../types/protocol.js';
import { logThought } from '../utils/logger.js';

interface Subscription {
    template: string;
    unsubscribe: () => void;
    replies: number;
}

export interface AutoResponderStatus {
    session: string;
    template: string;
    replies: number;
}

/**
 * Replies to private incoming messages with a fixed template.
 * Group and channel traffic is ignored. Replies share the session's rate limiter.
 */
export class AutoResponder {
    readonly #limiter: RateLimiter;
    readonly #subscriptions: Map<string, Subscription> = new Map();

    constructor(limiter: RateLimiter) {
        this.#limiter = limiter;
    }

    /** Start replying for `session`; replaces the template when already enabled. */
    enable(session: string, client: ProtocolClient, template: string): void {
        this.disable(session);

        const subscription: Subscription = {
            template,
            replies: 0,
            unsubscribe: () => undefined,
        };
        subscription.unsubscribe = client.onIncomingMessage((message) =>
            this.#handle(session, subscription, message),
        );
        this.#subscriptions.set(session, subscription);
        void logThought(`[AutoResponder] Enabled for session '${session}'.`);
    }

    disable(session: string): boolean {
        const subscription = this.#subscriptions.get(session);
        if (!subscription) return false;

        subscription.unsubscribe();
        this.#subscriptions.delete(session);
        void logThought(`[AutoResponder] Disabled for session '${session}' after ${subscription.replies} replies.`);
        return true;
    }

    isEnabled(session: string): boolean {
        return this.#subscriptions.has(session);
    }

    list(): AutoResponderStatus[] {
        return [...this.#subscriptions.entries()].map(([session, subscription]) => ({
            session,
            template: subscription.template,
            replies: subscription.replies,
        }));
    }

    stopAll(): void {
        for (const session of [...this.#subscriptions.keys()]) {
            this.disable(session);
        }
    }

    async #handle(session: string, subscription: Subscription, message: InboundMessage): Promise<void> {
        if (!message.isPrivate) return;
        // Late deliveries for a replaced or disabled subscription.
        if (this.#subscriptions.get(session) !== subscription) return;

        try {
            await this.#limiter.waitTurn(session, 'auto-reply');
            await message.reply(subscription.template);
            subscription.replies++;
            await logThought(`[AutoResponder] Replied to ${message.senderId} on session '${session}'.`);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            console.error(`[AutoResponder] Reply failed on session '${session}':`, reason);
            await logThought(`[AutoResponder] Reply failed on session '${session}': ${reason}`);
        }
    }
}
