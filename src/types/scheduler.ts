/** Status of a registered maintenance task. */
export type MaintenanceTaskStatus = 'idle' | 'running' | 'stopped' | 'error';

/** Configuration required to register a repeating maintenance task. */
export interface MaintenanceTaskConfig {
    /** Unique identifier (e.g. 'registry-retention'). */
    id: string;
    /** node-cron expression. */
    cronExpression: string;
    description: string;
    handler: () => Promise<void> | void;
    /** @default true */
    autoStart?: boolean;
}

export interface MaintenanceTaskSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: MaintenanceTaskStatus;
    lastRunAt: Date | null;
    lastError: string | null;
}

export type SchedulerEventType = 'task:start' | 'task:done' | 'task:error';

export interface SchedulerEvent {
    type: SchedulerEventType;
    taskId: string;
    timestamp: Date;
    error?: string;
}

export type SchedulerEventListener = (event: SchedulerEvent) => void;
