import type { Request, Response } from 'express';
import type { Dispatcher } from '../../interfaces/dispatcher.js';
import type { RateLimitPolicy } from '../../services/rate-limiter.js';
import { ValidationError } from '../../types/errors.js';
import { asNumber, asString, asStringList, field, isRecord } from '../request-body.js';
import { sendMappedError } from '../shared.js';
import { sendAccepted } from './sessions.js';

export interface OperationDeps {
    dispatcher: Dispatcher;
}

function readDelay(value: unknown): Partial<RateLimitPolicy> | undefined {
    if (!isRecord(value)) return undefined;
    const delay: Partial<RateLimitPolicy> = {};
    if (value.minDelayMs !== undefined) delay.minDelayMs = asNumber(value.minDelayMs);
    if (value.maxDelayMs !== undefined) delay.maxDelayMs = asNumber(value.maxDelayMs);
    if (value.jitterMs !== undefined) delay.jitterMs = asNumber(value.jitterMs);
    return delay;
}

/** POST /messages */
export function handleSendMessage(deps: OperationDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendAccepted(res, deps.dispatcher.sendMessage(
                asString(field(req.body, 'session')),
                asString(field(req.body, 'target')),
                asString(field(req.body, 'text')),
            ));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /messages/bulk */
export function handleBulkSend(deps: OperationDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendAccepted(res, deps.dispatcher.bulkSend(
                asString(field(req.body, 'session')),
                asStringList(field(req.body, 'targets')),
                asString(field(req.body, 'text')),
                readDelay(field(req.body, 'delay')),
            ));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /participants `chat` for one chat, `chats` for a merged multi-chat listing. */
export function handleParticipants(deps: OperationDeps) {
    return (req: Request, res: Response): void => {
        const session = asString(field(req.body, 'session'));
        const limit = asNumber(field(req.body, 'limit'));
        const chat = field(req.body, 'chat');

        try {
            const handle = typeof chat === 'string'
                ? deps.dispatcher.getParticipants(session, chat, limit)
                : deps.dispatcher.parseUsers(session, asStringList(field(req.body, 'chats')), limit);
            sendAccepted(res, handle);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /dialogs */
export function handleListDialogs(deps: OperationDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendAccepted(res, deps.dispatcher.listDialogs(
                asString(field(req.body, 'session')),
                asNumber(field(req.body, 'limit')),
            ));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /phones/verify */
export function handleVerifyPhones(deps: OperationDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendAccepted(res, deps.dispatcher.verifyPhone(
                asString(field(req.body, 'session')),
                asStringList(field(req.body, 'numbers')),
            ));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /invites */
export function handleInvite(deps: OperationDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendAccepted(res, deps.dispatcher.inviteUsers(
                asString(field(req.body, 'session')),
                asString(field(req.body, 'chat')),
                asStringList(field(req.body, 'users')),
            ));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /auto-respond */
export function handleAutoRespond(deps: OperationDeps) {
    return (req: Request, res: Response): void => {
        const enabled = field(req.body, 'enabled');
        try {
            if (typeof enabled !== 'boolean') {
                throw new ValidationError('Auto-respond toggle', ['Enabled flag must be a boolean.']);
            }
            sendAccepted(res, deps.dispatcher.toggleAutoRespond(
                asString(field(req.body, 'session')),
                enabled,
                asString(field(req.body, 'template')),
            ));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
