import * as readline from 'node:readline';
import type { Dispatcher } from '../interfaces/dispatcher.js';
import type { JobHandle, JobSnapshot } from '../types/job.js';
import type { SessionStatus } from '../types/session.js';
import { logThought } from '../utils/logger.js';
import { readOption } from './cli.js';

export type AskFn = (question: string) => Promise<string>;

export interface SessionCliDeps {
    dispatcher: Dispatcher;
    /** Reads one answer from the operator. Defaults to a stdin prompt. */
    ask?: AskFn;
}

const USAGE = [
    'Usage:',
    '  relaydesk session login <name> --api-id <id> --api-hash <hash> --phone <number>',
    '  relaydesk session list [--json]',
    '  relaydesk session remove <name>',
].join('\n');

function createStdinAsk(): { ask: AskFn; close: () => void } {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    return {
        ask: (question) => new Promise((resolve) => {
            rl.question(question, (answer) => resolve(answer.trim()));
        }),
        close: () => rl.close(),
    };
}

function describeFailure(snapshot: JobSnapshot): string {
    if (snapshot.error) return `[${snapshot.error.kind}] ${snapshot.error.message}`;
    return `job ended ${snapshot.state}`;
}

/**
 * Handle the `session` command.
 * Returns `true` when the command was recognized and handled.
 */
export async function handleSessionCli(argv: string[], deps: SessionCliDeps): Promise<boolean> {
    if (argv[0] !== 'session') return false;

    const { dispatcher } = deps;
    const subcommand = argv[1];

    try {
        if (subcommand === 'list') {
            const sessions = dispatcher.listSessions();
            if (argv.includes('--json')) {
                console.log(JSON.stringify(sessions, null, 2));
            } else if (sessions.length === 0) {
                console.log('No sessions stored.');
            } else {
                for (const session of sessions) {
                    const extra = session.lastError ? `  (${session.lastError})` : '';
                    console.log(`${session.name}  ${session.phone}  ${session.status}${extra}`);
                }
            }
            process.exitCode = 0;
            return true;
        }

        if (subcommand === 'remove') {
            const outcome = await settle(dispatcher, dispatcher.removeSession(argv[2] ?? ''));
            if (outcome.state === 'completed') {
                console.log(`Session '${argv[2]}' removed.`);
                process.exitCode = 0;
            } else {
                console.error(`[RelayDesk] Could not remove session: ${describeFailure(outcome)}`);
                process.exitCode = 1;
            }
            return true;
        }

        if (subcommand === 'login') {
            const owned = deps.ask ? null : createStdinAsk();
            const ask = deps.ask ?? owned?.ask;
            try {
                if (!ask) throw new Error('No prompt available.');
                process.exitCode = (await runLogin(argv, dispatcher, ask)) ? 0 : 1;
            } finally {
                owned?.close();
            }
            return true;
        }

        console.error(USAGE);
        process.exitCode = 1;
        return true;
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[RelayDesk] ${message}`);
        process.exitCode = 1;
        return true;
    }
}

async function runLogin(argv: string[], dispatcher: Dispatcher, ask: AskFn): Promise<boolean> {
    const name = argv[2] ?? '';
    const handle = dispatcher.createSession({
        name,
        apiId: Number(readOption(argv, '--api-id') ?? NaN),
        apiHash: readOption(argv, '--api-hash') ?? '',
        phone: readOption(argv, '--phone') ?? '',
    });

    let status = await sessionStep(dispatcher, handle);
    if (status === null) return false;

    let code = '';
    // A rejected code keeps the session waiting, so the operator may retry.
    while (status === 'awaiting-code') {
        code = await ask('Login code: ');
        if (code.length === 0) {
            console.error('[RelayDesk] Login aborted.');
            return false;
        }
        status = await sessionStep(dispatcher, dispatcher.authorizeSession(name, code));
        if (status === null) status = 'awaiting-code';
    }

    while (status === 'awaiting-password') {
        const password = await ask('Two-step password: ');
        if (password.length === 0) {
            console.error('[RelayDesk] Login aborted.');
            return false;
        }
        status = await sessionStep(dispatcher, dispatcher.authorizeSession(name, code, password));
        if (status === null) status = 'awaiting-password';
    }

    if (status === 'authenticated') {
        console.log(`Session '${name}' is authenticated.`);
        await logThought(`[SessionCli] Session '${name}' logged in interactively.`);
        return true;
    }

    console.error(`[RelayDesk] Session '${name}' ended in status '${status}'.`);
    return false;
}

/** Wait for a session job; prints the failure and yields null when it did not complete. */
async function sessionStep(dispatcher: Dispatcher, handle: JobHandle): Promise<SessionStatus | null> {
    const outcome = await settle(dispatcher, handle);
    if (outcome.state === 'completed' && outcome.result?.type === 'session') {
        return outcome.result.status;
    }
    console.error(`[RelayDesk] ${outcome.label}: ${describeFailure(outcome)}`);
    return null;
}

function settle(dispatcher: Dispatcher, handle: JobHandle): Promise<JobSnapshot> {
    return dispatcher.awaitResult(handle);
}
