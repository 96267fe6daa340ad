import type { JobState } from '../types/job.js';

export const ALLOWED_TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
    pending: ['running', 'cancelled'],
    running: ['cancelling', 'completed', 'failed', 'cancelled'],
    cancelling: ['cancelled'],
    completed: [],
    failed: [],
    cancelled: [],
};

const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>(['completed', 'failed', 'cancelled']);

export function isTerminal(state: JobState): boolean {
    return TERMINAL_STATES.has(state);
}

export function canTransition(from: JobState, to: JobState): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
}
