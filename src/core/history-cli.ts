import type { JobHistory, JobHistoryEntry } from '../services/job-history.js';
import { readOption } from './cli.js';

function formatEntry(entry: JobHistoryEntry): string {
    const progress = entry.progress.total === null
        ? `${entry.progress.completed}`
        : `${entry.progress.completed}/${entry.progress.total}`;
    const error = entry.error ? `  [${entry.error.kind}] ${entry.error.message}` : '';
    return `${entry.endedAt ?? '-'}  ${entry.state.padEnd(9)}  ${entry.kind.padEnd(19)}  ${progress.padEnd(7)}  ${entry.label}${error}`;
}

/**
 * Handle `jobs history`.
 * Returns `true` when the command was recognized and handled.
 */
export function handleHistoryCli(argv: string[], history: JobHistory): boolean {
    if (argv[0] !== 'jobs') return false;

    if (argv[1] !== 'history') {
        console.error('Usage: relaydesk jobs history [--limit <n>] [--session <name>] [--json]');
        process.exitCode = 1;
        return true;
    }

    const requestedLimit = Number(readOption(argv, '--limit') ?? 50);
    const limit = Number.isInteger(requestedLimit) && requestedLimit > 0 ? requestedLimit : 50;
    const session = readOption(argv, '--session');

    try {
        const entries = history.list(limit, session);
        if (argv.includes('--json')) {
            console.log(JSON.stringify(entries, null, 2));
        } else if (entries.length === 0) {
            console.log('No finished jobs recorded yet.');
        } else {
            for (const entry of entries) {
                console.log(formatEntry(entry));
            }
        }
        process.exitCode = 0;
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[RelayDesk] Could not read job history: ${message}`);
        process.exitCode = 1;
    }
    return true;
}
