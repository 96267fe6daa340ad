import { createServer, type Server } from 'node:http';
import express, { type ErrorRequestHandler, type Express, type RequestHandler } from 'express';
import { handleHealth, type HealthDeps } from './handlers/health.js';
import {
    handleAwaitJob,
    handleCancelJob,
    handleGetJob,
    handleJobHistory,
    handleListJobs,
    handlePurgeJob,
    type JobDeps,
} from './handlers/jobs.js';
import {
    handleAuthorizeSession,
    handleCreateSession,
    handleDisconnectSession,
    handleListSessions,
    handleReconnectSession,
    handleRemoveSession,
} from './handlers/sessions.js';
import {
    handleAutoRespond,
    handleBulkSend,
    handleInvite,
    handleListDialogs,
    handleParticipants,
    handleSendMessage,
    handleVerifyPhones,
} from './handlers/operations.js';
import { requestLogger, requireSignature, sendError, sendMappedError, setRawRequestBody } from './shared.js';
import type { Dispatcher } from '../interfaces/dispatcher.js';
import type { JobHistory } from '../services/job-history.js';
import type { WsHub } from './websocket-hub.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps extends HealthDeps {
    dispatcher: Dispatcher;
    history: JobHistory;
    wsHub?: WsHub;
    /** Replaces the `X-Signature` check on mutating routes. */
    signatureGuard?: RequestHandler;
}

const DEFAULT_PORT = 3200;

/**
 * Build the control-plane express app.
 *
 * Endpoints:
 *   GET    /health                     Runtime, job and session summary
 *   GET    /jobs                       Registry listing (?state, ?kind, ?session)
 *   GET    /jobs/history               Persisted terminal jobs
 *   GET    /jobs/:id                   One job snapshot
 *   POST   /jobs/:id/cancel            Cooperative cancel (signed)
 *   DELETE /jobs/:id                   Purge a terminal job (signed)
 *   POST   /jobs/:id/await             Wait for a terminal state (signed)
 *   GET    /sessions                   Session slots
 *   POST   /sessions                   Create a session and request a login code (signed)
 *   POST   /sessions/:name/authorize   Submit the login code / password (signed)
 *   POST   /sessions/:name/reconnect   Reconnect with the stored login (signed)
 *   POST   /sessions/:name/disconnect  Disconnect (signed)
 *   DELETE /sessions/:name             Disconnect and forget the stored login (signed)
 *   POST   /messages                   Send one message (signed)
 *   POST   /messages/bulk              Bulk send (signed)
 *   POST   /participants               Parse chat members (signed)
 *   POST   /dialogs                    List dialogs (signed)
 *   POST   /phones/verify              Check phone registration (signed)
 *   POST   /invites                    Invite users to a chat (signed)
 *   POST   /auto-respond               Toggle auto-reply (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();
    const signed = deps.signatureGuard ?? requireSignature;

    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    const jobDeps: JobDeps = { dispatcher: deps.dispatcher, history: deps.history };
    const dispatcherDeps = { dispatcher: deps.dispatcher };

    app.get('/health', handleHealth(deps));

    app.get('/jobs', handleListJobs(jobDeps));
    app.get('/jobs/history', handleJobHistory(jobDeps));
    app.get('/jobs/:id', handleGetJob(jobDeps));
    app.post('/jobs/:id/cancel', signed, handleCancelJob(jobDeps));
    app.delete('/jobs/:id', signed, handlePurgeJob(jobDeps));
    app.post('/jobs/:id/await', signed, handleAwaitJob(jobDeps));

    app.get('/sessions', handleListSessions(dispatcherDeps));
    app.post('/sessions', signed, handleCreateSession(dispatcherDeps));
    app.post('/sessions/:name/authorize', signed, handleAuthorizeSession(dispatcherDeps));
    app.post('/sessions/:name/reconnect', signed, handleReconnectSession(dispatcherDeps));
    app.post('/sessions/:name/disconnect', signed, handleDisconnectSession(dispatcherDeps));
    app.delete('/sessions/:name', signed, handleRemoveSession(dispatcherDeps));

    app.post('/messages', signed, handleSendMessage(dispatcherDeps));
    app.post('/messages/bulk', signed, handleBulkSend(dispatcherDeps));
    app.post('/participants', signed, handleParticipants(dispatcherDeps));
    app.post('/dialogs', signed, handleListDialogs(dispatcherDeps));
    app.post('/phones/verify', signed, handleVerifyPhones(dispatcherDeps));
    app.post('/invites', signed, handleInvite(dispatcherDeps));
    app.post('/auto-respond', signed, handleAutoRespond(dispatcherDeps));

    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    const handleUncaught: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
        if (err instanceof SyntaxError) {
            sendError(res, 'Malformed JSON body.', 400);
            return;
        }
        sendMappedError(res, err);
    };
    app.use(handleUncaught);

    return app;
}

/** Create the app, attach the WebSocket hub and listen on `port`. */
export function startApiServer(deps: ApiServerDeps, port: number = DEFAULT_PORT): Server {
    const app = createApiApp(deps);
    const server = createServer(app);

    if (deps.wsHub) {
        deps.wsHub.attach(server);
    }

    server.listen(port, () => {
        console.log(`[API] Control plane listening on http://localhost:${port}`);
        void logThought(`[API] Control plane started on port ${port}.`);
    });

    return server;
}
