import { resolveConfig, type RelayDeskConfig } from '../config/json-config.js';
import { Dispatcher } from '../interfaces/dispatcher.js';
import { createMtprotoClientFactory } from '../interfaces/mtproto_client.js';
import { TelegramNotifier } from '../interfaces/telegram_notifier.js';
import { AutoResponder } from '../services/auto-responder.js';
import { JobHistory } from '../services/job-history.js';
import { MaintenanceScheduler } from '../services/maintenance-scheduler.js';
import { OperatorNotifier, type NotifySendFn } from '../services/operator-notifier.js';
import { ProfileStore } from '../services/profile-store.js';
import { RateLimiter, type RateLimiterOptions } from '../services/rate-limiter.js';
import { SessionManager } from '../services/session-manager.js';
import { TaskBridge } from '../services/task-bridge.js';
import { TaskRegistry } from '../services/task-registry.js';
import { WorkerRuntime, type DrainReport } from '../services/worker-runtime.js';
import type { ProtocolClientFactory } from '../types/protocol.js';
import { logThought } from '../utils/logger.js';

export const RETENTION_TASK_ID = 'registry-retention';

export interface RelayDeskOptions {
    config?: RelayDeskConfig;
    clientFactory?: ProtocolClientFactory;
    /** Clock, randomness and sleep hooks for the rate limiter. */
    limiter?: Pick<RateLimiterOptions, 'now' | 'random' | 'sleep'>;
    /** Replaces the Bot API sender for operator alerts. */
    notifySend?: NotifySendFn;
    /** Start the cron retention sweep. @default true */
    scheduleMaintenance?: boolean;
}

/** Every long-lived service of one process, wired together. */
export interface RelayDesk {
    config: RelayDeskConfig;
    registry: TaskRegistry;
    runtime: WorkerRuntime;
    bridge: TaskBridge;
    limiter: RateLimiter;
    sessions: SessionManager;
    autoResponder: AutoResponder;
    scheduler: MaintenanceScheduler;
    history: JobHistory;
    profiles: ProfileStore;
    notifier: OperatorNotifier | null;
    dispatcher: Dispatcher;
    shutdown(): Promise<DrainReport>;
}

export function createRelayDesk(options: RelayDeskOptions = {}): RelayDesk {
    const config = options.config ?? resolveConfig();

    const registry = new TaskRegistry({
        retention: {
            maxTerminalJobs: config.runtime.retentionMaxJobs,
            maxTerminalAgeMs: config.runtime.retentionMaxAgeMs,
        },
    });
    const runtime = new WorkerRuntime(registry, {
        maxConcurrent: config.runtime.maxConcurrentJobs ?? undefined,
        drainGraceMs: config.runtime.drainGraceMs,
    });
    const bridge = new TaskBridge(registry, runtime);
    const limiter = new RateLimiter({
        minDelayMs: config.rateLimit.minDelayMs,
        maxDelayMs: config.rateLimit.maxDelayMs,
        jitterMs: config.rateLimit.jitterMs,
        ...options.limiter,
    });

    const sessions = new SessionManager(options.clientFactory ?? createMtprotoClientFactory());
    const restored = sessions.restore();
    const autoResponder = new AutoResponder(limiter);
    const profiles = new ProfileStore();

    const history = new JobHistory(config.runtime.historyLimit);
    bridge.onEvent(history.onJobEvent);

    const scheduler = new MaintenanceScheduler();
    scheduler.register({
        id: RETENTION_TASK_ID,
        cronExpression: config.runtime.retentionSweepCron,
        description: 'Evict expired terminal jobs and prune job history',
        handler: () => {
            const evicted = registry.enforceRetention();
            const pruned = history.prune();
            if (evicted > 0 || pruned > 0) {
                void logThought(`[Maintenance] Evicted ${evicted} jobs, pruned ${pruned} history rows.`);
            }
        },
        autoStart: options.scheduleMaintenance ?? true,
    });

    const notifier = createNotifier(config, options.notifySend);
    if (notifier) {
        bridge.onEvent(notifier.onJobEvent);
        scheduler.on('task:error', (event) => {
            void notifier.onSchedulerEvent(event);
        });
    }

    const dispatcher = new Dispatcher(
        { bridge, registry, runtime, sessions, limiter, autoResponder, scheduler },
        {
            retry: config.retry,
            maxBulkItems: config.rateLimit.maxBulkItems,
            awaitTimeoutMs: config.runtime.awaitTimeoutMs,
            drainGraceMs: config.runtime.drainGraceMs,
        },
    );

    runtime.start();
    void logThought(`[RelayDesk] Runtime started with ${restored} restored sessions.`);

    return {
        config,
        registry,
        runtime,
        bridge,
        limiter,
        sessions,
        autoResponder,
        scheduler,
        history,
        profiles,
        notifier,
        dispatcher,
        shutdown: () => dispatcher.shutdown(),
    };
}

function createNotifier(config: RelayDeskConfig, send?: NotifySendFn): OperatorNotifier | null {
    const { enabled, botToken, chatId } = config.notifications;
    if (!chatId) return null;

    if (send) {
        return new OperatorNotifier(send, { platform: 'telegram', chatId }, enabled);
    }
    if (!enabled || !botToken) return null;

    const telegram = new TelegramNotifier(botToken);
    return new OperatorNotifier(telegram.send, { platform: 'telegram', chatId });
}
