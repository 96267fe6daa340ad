import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type {
    MaintenanceTaskConfig,
    MaintenanceTaskSnapshot,
    MaintenanceTaskStatus,
    SchedulerEvent,
    SchedulerEventListener,
    SchedulerEventType,
} from '../types/scheduler.js';

interface RegisteredTask {
    config: MaintenanceTaskConfig;
    task: ScheduledTask | null;
    status: MaintenanceTaskStatus;
    lastRunAt: Date | null;
    lastError: string | null;
}

/**
 * Runs repeating housekeeping (registry retention, history pruning) on
 * node-cron schedules, with error isolation and event emission.
 *
 * ```ts
 * const scheduler = new MaintenanceScheduler();
 * scheduler.register({
 *   id: 'registry-retention',
 *   cronExpression: '*\/5 * * * *',
 *   description: 'Evict expired terminal jobs',
 *   handler: () => { registry.enforceRetention(); },
 * });
 * ```
 */
export class MaintenanceScheduler {
    readonly #tasks: Map<string, RegisteredTask> = new Map();
    readonly #listeners: Map<SchedulerEventType, Set<SchedulerEventListener>> = new Map();

    /** Register a repeating task. Throws on a duplicate id or an invalid cron expression. */
    register(config: MaintenanceTaskConfig): void {
        if (this.#tasks.has(config.id)) {
            throw new Error(`[MaintenanceScheduler] Task '${config.id}' is already registered.`);
        }

        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[MaintenanceScheduler] Invalid cron expression for task '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredTask = {
            config,
            task: null,
            status: 'idle',
            lastRunAt: null,
            lastError: null,
        };
        this.#tasks.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startTask(entry);
        }
    }

    unregister(taskId: string): boolean {
        const entry = this.#tasks.get(taskId);
        if (!entry) return false;

        entry.task?.stop();
        this.#tasks.delete(taskId);
        return true;
    }

    /** Run a task immediately, outside its schedule. */
    async runNow(taskId: string): Promise<void> {
        const entry = this.#tasks.get(taskId);
        if (!entry) {
            throw new Error(`[MaintenanceScheduler] Task '${taskId}' is not registered.`);
        }
        await this.#executeTask(entry);
    }

    startAll(): void {
        for (const entry of this.#tasks.values()) {
            this.#startTask(entry);
        }
    }

    stopAll(): void {
        for (const entry of this.#tasks.values()) {
            if (entry.task) {
                entry.task.stop();
                entry.task = null;
                entry.status = 'stopped';
            }
        }
    }

    listTasks(): MaintenanceTaskSnapshot[] {
        return [...this.#tasks.values()].map(toSnapshot);
    }

    getTask(taskId: string): MaintenanceTaskSnapshot | undefined {
        const entry = this.#tasks.get(taskId);
        return entry ? toSnapshot(entry) : undefined;
    }

    /** Subscribe to scheduler events. Returns an unsubscribe function. */
    on(eventType: SchedulerEventType, listener: SchedulerEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #startTask(entry: RegisteredTask): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.config.cronExpression, async () => {
            await this.#executeTask(entry);
        });
        entry.status = 'idle';
    }

    async #executeTask(entry: RegisteredTask): Promise<void> {
        const { config } = entry;
        entry.status = 'running';
        entry.lastRunAt = new Date();

        this.#emit({ type: 'task:start', taskId: config.id, timestamp: new Date() });

        try {
            await config.handler();
            entry.status = entry.task ? 'idle' : 'stopped';
            entry.lastError = null;
            this.#emit({ type: 'task:done', taskId: config.id, timestamp: new Date() });
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            entry.status = 'error';
            entry.lastError = message;

            console.error(`[MaintenanceScheduler] Task '${config.id}' failed:`, message);
            await logThought(`[MaintenanceScheduler] Task '${config.id}' failed: ${message}`);

            this.#emit({ type: 'task:error', taskId: config.id, timestamp: new Date(), error: message });
        }
    }

    #emit(event: SchedulerEvent): void {
        const listeners = this.#listeners.get(event.type);
        if (!listeners) return;

        for (const listener of listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[MaintenanceScheduler] Event listener threw an error:', listenerErr);
            }
        }
    }
}

function toSnapshot(entry: RegisteredTask): MaintenanceTaskSnapshot {
    return {
        id: entry.config.id,
        cronExpression: entry.config.cronExpression,
        description: entry.config.description,
        status: entry.status,
        lastRunAt: entry.lastRunAt,
        lastError: entry.lastError,
    };
}
