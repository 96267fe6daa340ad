import type { Request, Response } from 'express';
import type { Dispatcher } from '../../interfaces/dispatcher.js';
import type { JobAcceptedData } from '../../types/api.js';
import type { JobHandle } from '../../types/job.js';
import { asNumber, asOptionalString, asString, field } from '../request-body.js';
import { sendMappedError, sendOk } from '../shared.js';

export interface SessionDeps {
    dispatcher: Dispatcher;
}

export function sendAccepted(res: Response, handle: JobHandle): void {
    const data: JobAcceptedData = { jobId: handle.id, kind: handle.kind };
    sendOk(res, data, 202);
}

/** GET /sessions */
export function handleListSessions(deps: SessionDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, { sessions: deps.dispatcher.listSessions() });
    };
}

/** POST /sessions register the slot and request a login code. */
export function handleCreateSession(deps: SessionDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendAccepted(res, deps.dispatcher.createSession({
                name: asString(field(req.body, 'name')),
                apiId: asNumber(field(req.body, 'apiId')),
                apiHash: asString(field(req.body, 'apiHash')),
                phone: asString(field(req.body, 'phone')),
            }));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /sessions/:name/authorize */
export function handleAuthorizeSession(deps: SessionDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendAccepted(res, deps.dispatcher.authorizeSession(
                req.params.name,
                asString(field(req.body, 'code')),
                asOptionalString(field(req.body, 'password')),
            ));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /sessions/:name/reconnect */
export function handleReconnectSession(deps: SessionDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendAccepted(res, deps.dispatcher.reconnectSession(req.params.name));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /sessions/:name/disconnect */
export function handleDisconnectSession(deps: SessionDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendAccepted(res, deps.dispatcher.disconnectSession(req.params.name));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** DELETE /sessions/:name disconnect and drop the stored login. */
export function handleRemoveSession(deps: SessionDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendAccepted(res, deps.dispatcher.removeSession(req.params.name));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
