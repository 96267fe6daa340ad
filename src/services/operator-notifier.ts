import { logThought } from '../utils/logger.js';
import type { JobEvent, JobSnapshot } from '../types/job.js';
import type { SchedulerEvent } from '../types/scheduler.js';

/** Chat that receives operator alerts. */
export interface NotifyTarget {
    platform: 'telegram';
    chatId: string | number;
}

/** Callback that actually delivers an alert to a platform. */
export type NotifySendFn = (target: NotifyTarget, text: string) => Promise<void>;

/**
 * Pushes short alerts to the operator's chat when something worth attention
 * happens in the background: a bulk job finished, any job failed, or a
 * maintenance task errored.
 *
 * ```ts
 * const notifier = new OperatorNotifier(sendFn, { platform: 'telegram', chatId });
 * bridge.onEvent(notifier.onJobEvent);
 * scheduler.on('task:error', (e) => void notifier.onSchedulerEvent(e));
 * ```
 */
export class OperatorNotifier {
    readonly #send: NotifySendFn;
    readonly #defaultTarget: NotifyTarget;
    #enabled: boolean;

    constructor(send: NotifySendFn, defaultTarget: NotifyTarget, enabled = true) {
        this.#send = send;
        this.#defaultTarget = defaultTarget;
        this.#enabled = enabled;
    }

    setEnabled(value: boolean): void {
        this.#enabled = value;
    }

    get enabled(): boolean {
        return this.#enabled;
    }

    /** Bridge listener. Delivery runs detached so the emitting side never waits on the network. */
    readonly onJobEvent = (event: JobEvent): void => {
        if (!this.#enabled || event.type !== 'job:transition') return;

        const text = describeJob(event.snapshot);
        if (text === null) return;
        void this.#dispatch(text);
    };

    async onSchedulerEvent(event: SchedulerEvent): Promise<void> {
        if (!this.#enabled) return;

        if (event.type === 'task:error') {
            const message =
                `⚠️ Maintenance task failed\n` +
                `Task: ${event.taskId}\n` +
                `Error: ${event.error ?? 'Unknown error'}\n` +
                `Time: ${event.timestamp.toISOString()}`;
            await this.#dispatch(message);
        }
    }

    async notify(text: string, target?: NotifyTarget): Promise<void> {
        if (!this.#enabled) return;
        await this.#dispatch(text, target);
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #dispatch(text: string, target?: NotifyTarget): Promise<void> {
        const destination = target ?? this.#defaultTarget;

        try {
            await logThought(`[OperatorNotifier] Sending alert to ${destination.platform}:${destination.chatId}`);
            await this.#send(destination, text);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error('[OperatorNotifier] Failed to deliver alert:', message);
            await logThought(`[OperatorNotifier] Delivery failed: ${message}`);
        }
    }
}

/** Alert text for a job transition, or `null` when the transition is routine. */
export function describeJob(snapshot: JobSnapshot): string | null {
    if (snapshot.state === 'failed') {
        return (
            `❌ Job failed\n` +
            `Job: ${snapshot.label} (${snapshot.id})\n` +
            `Error: [${snapshot.error?.kind ?? 'unknown'}] ${snapshot.error?.message ?? 'Unknown error'}`
        );
    }

    if (snapshot.state === 'completed' && snapshot.result?.type === 'bulk') {
        const { total, succeeded, failed } = snapshot.result;
        return (
            `✅ Bulk job finished\n` +
            `Job: ${snapshot.label} (${snapshot.id})\n` +
            `Delivered: ${succeeded}/${total}, failed: ${failed}`
        );
    }

    return null;
}
