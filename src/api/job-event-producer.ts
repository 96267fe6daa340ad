import { logThought } from '../utils/logger.js';
import type { WsHub } from './websocket-hub.js';
import type { TaskBridge } from '../services/task-bridge.js';
import type { TaskRegistry } from '../services/task-registry.js';
import { buildHealthData, type HealthDeps } from './handlers/health.js';

const DEFAULT_PUBLISH_INTERVAL_MS = 5_000;

export interface JobEventProducerDeps extends HealthDeps {
    hub: WsHub;
    bridge: TaskBridge;
    registry: TaskRegistry;
}

export interface JobEventProducerConfig {
    publishIntervalMs?: number;
}

/**
 * Forwards job events and session changes to the WebSocket hub as they
 * happen, and publishes a health summary on a fixed interval. Also serves as
 * the hub's snapshot source for new subscribers.
 */
export class JobEventProducer {
    readonly #deps: JobEventProducerDeps;
    readonly #intervalMs: number;
    #timer: ReturnType<typeof setInterval> | null = null;
    #unsubscribers: Array<() => void> = [];

    constructor(deps: JobEventProducerDeps, config: JobEventProducerConfig = {}) {
        this.#deps = deps;
        this.#intervalMs = config.publishIntervalMs ?? DEFAULT_PUBLISH_INTERVAL_MS;

        this.#deps.hub.setSource({
            listJobs: () => this.#deps.registry.list(),
            listSessions: () => this.#deps.sessions.list(),
            health: () => buildHealthData(this.#deps),
        });
    }

    start(): void {
        if (this.#timer) return;

        this.#unsubscribers = [
            this.#deps.bridge.onEvent((event) => this.#deps.hub.publishJob(event)),
            this.#deps.sessions.onChange((session) => this.#deps.hub.publishSession(session)),
        ];

        this.#timer = setInterval(() => {
            this.#deps.hub.publishHealth(buildHealthData(this.#deps));
        }, this.#intervalMs);
        void logThought('[JobEventProducer] Started event publishing.');
    }

    stop(): void {
        if (this.#timer) {
            clearInterval(this.#timer);
            this.#timer = null;
        }
        for (const unsubscribe of this.#unsubscribers) {
            unsubscribe();
        }
        this.#unsubscribers = [];
        void logThought('[JobEventProducer] Stopped.');
    }
}
