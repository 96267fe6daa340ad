import type { Request, Response } from 'express';
import type { Dispatcher } from '../../interfaces/dispatcher.js';
import type { JobHistory } from '../../services/job-history.js';
import { isTerminal } from '../../core/job-state.js';
import { JOB_KINDS, JOB_STATES, type JobFilter, type JobKind, type JobState } from '../../types/job.js';
import { asNumber, field } from '../request-body.js';
import { sendError, sendMappedError, sendOk } from '../shared.js';

const MAX_HISTORY_LIMIT = 500;

export interface JobDeps {
    dispatcher: Dispatcher;
    history: JobHistory;
}

function isJobState(value: unknown): value is JobState {
    return JOB_STATES.some((state) => state === value);
}

function isJobKind(value: unknown): value is JobKind {
    return JOB_KINDS.some((kind) => kind === value);
}

/** GET /jobs registry listing, filterable by `state`, `kind` and `session`. */
export function handleListJobs(deps: JobDeps) {
    return (req: Request, res: Response): void => {
        const { state, kind, session } = req.query;
        const filter: JobFilter = {};

        if (state !== undefined) {
            if (!isJobState(state)) {
                sendError(res, `Unknown job state. Expected one of: ${JOB_STATES.join(', ')}.`, 400);
                return;
            }
            filter.state = state;
        }
        if (kind !== undefined) {
            if (!isJobKind(kind)) {
                sendError(res, `Unknown job kind. Expected one of: ${JOB_KINDS.join(', ')}.`, 400);
                return;
            }
            filter.kind = kind;
        }
        if (typeof session === 'string' && session.length > 0) {
            filter.sessionName = session;
        }

        sendOk(res, { jobs: deps.dispatcher.listJobs(filter) });
    };
}

/** GET /jobs/history terminal jobs persisted beyond registry retention. */
export function handleJobHistory(deps: JobDeps) {
    return (req: Request, res: Response): void => {
        const requestedLimit = Number(req.query.limit ?? 50);
        const limit = Number.isFinite(requestedLimit) && requestedLimit > 0
            ? Math.min(MAX_HISTORY_LIMIT, Math.floor(requestedLimit))
            : 50;
        const session = typeof req.query.session === 'string' ? req.query.session : undefined;

        try {
            sendOk(res, { entries: deps.history.list(limit, session) });
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** GET /jobs/:id */
export function handleGetJob(deps: JobDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendOk(res, deps.dispatcher.getJobStatus(req.params.id));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /jobs/:id/cancel `cancelled` is false when the job had already settled. */
export function handleCancelJob(deps: JobDeps) {
    return (req: Request, res: Response): void => {
        try {
            deps.dispatcher.getJobStatus(req.params.id);
            const cancelled = deps.dispatcher.cancelJob(req.params.id);
            sendOk(res, { cancelled, job: deps.dispatcher.getJobStatus(req.params.id) });
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** DELETE /jobs/:id purge a terminal job from the registry. */
export function handlePurgeJob(deps: JobDeps) {
    return (req: Request, res: Response): void => {
        try {
            const job = deps.dispatcher.getJobStatus(req.params.id);
            if (!isTerminal(job.state)) {
                sendError(res, `Job ${job.id} is still ${job.state}; cancel it before purging.`, 409);
                return;
            }
            sendOk(res, { purged: deps.dispatcher.purgeJob(job.id) });
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /jobs/:id/await block this request (not the runtime) until the job settles. */
export function handleAwaitJob(deps: JobDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const rawTimeout = field(req.body, 'timeoutMs');
        const timeoutMs = rawTimeout === undefined ? undefined : asNumber(rawTimeout);
        if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs < 0)) {
            sendError(res, 'timeoutMs must be a non-negative number.', 400);
            return;
        }

        try {
            sendOk(res, await deps.dispatcher.awaitResult(req.params.id, timeoutMs));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
