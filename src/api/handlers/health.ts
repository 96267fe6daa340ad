import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { TaskRegistry } from '../../services/task-registry.js';
import type { WorkerRuntime } from '../../services/worker-runtime.js';
import type { SessionManager } from '../../services/session-manager.js';
import type { AutoResponder } from '../../services/auto-responder.js';
import type { MaintenanceScheduler } from '../../services/maintenance-scheduler.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    registry: TaskRegistry;
    runtime: WorkerRuntime;
    sessions: SessionManager;
    autoResponder: AutoResponder;
    scheduler: MaintenanceScheduler;
}

export function buildHealthData(deps: HealthDeps): HealthData {
    const sessions = deps.sessions.list();
    const maintenance = deps.scheduler.listTasks();
    const errored = sessions.filter((session) => session.status === 'error').length;

    return {
        status: !deps.runtime.accepting || errored > 0 || maintenance.some((task) => task.status === 'error')
            ? 'degraded'
            : 'ok',
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
        runtime: {
            accepting: deps.runtime.accepting,
            active: deps.runtime.activeCount,
            queued: deps.runtime.queuedCount,
        },
        jobs: deps.registry.counts(),
        sessions: {
            total: sessions.length,
            authenticated: sessions.filter((session) => session.status === 'authenticated').length,
            errored,
        },
        autoResponders: deps.autoResponder.list().length,
        maintenance,
    };
}

/** GET /health runtime, job and session summary. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, buildHealthData(deps));
    };
}
