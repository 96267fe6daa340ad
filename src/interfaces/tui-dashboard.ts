import blessed from 'blessed';
import type { RelayDesk } from '../core/bootstrap.js';
import type { JobEvent, JobSnapshot } from '../types/job.js';
import { executeCommand, parseCommand } from './tui-commands.js';

const RENDER_THROTTLE_MS = 100;
const MAX_JOB_ROWS = 200;

export interface TuiHandle {
    stop(): void;
}

function formatProgress(job: JobSnapshot): string {
    if (job.progress.total === null) return job.progress.completed > 0 ? String(job.progress.completed) : '-';
    return `${job.progress.completed}/${job.progress.total}`;
}

function jobRows(jobs: JobSnapshot[]): string[][] {
    const rows = jobs
        .slice()
        .sort((left, right) => right.createdAt.localeCompare(left.createdAt))
        .slice(0, MAX_JOB_ROWS)
        .map((job) => [job.id.slice(0, 8), job.kind, job.state, formatProgress(job), job.label]);
    return [['Job', 'Kind', 'State', 'Progress', 'Label'], ...rows];
}

function describeEvent(event: JobEvent): string | null {
    if (event.type !== 'job:transition') return null;
    const job = event.snapshot;
    const suffix = job.error ? ` {red-fg}[${job.error.kind}] ${job.error.message}{/red-fg}` : '';
    return `${job.id.slice(0, 8)} ${job.kind} ${event.previousState ?? '-'} -> ${job.state}${suffix}`;
}

/**
 * Terminal dashboard: job table, session list, log view and a command box.
 * Commands submit jobs and return at once; the view redraws from job events.
 */
export function startTUI(desk: RelayDesk, onQuit: () => void): TuiHandle {
    const { dispatcher, sessions } = desk;
    const screen = blessed.screen({ smartCSR: true, title: 'RelayDesk' });

    const jobTable = blessed.listtable({
        parent: screen,
        label: ' Jobs ',
        top: 0,
        left: 0,
        width: '70%',
        height: '60%',
        border: { type: 'line' },
        tags: true,
        keys: true,
        style: { header: { bold: true }, cell: { fg: 'white' } },
    });

    const sessionView = blessed.box({
        parent: screen,
        label: ' Sessions ',
        top: 0,
        left: '70%',
        width: '30%',
        height: '60%',
        border: { type: 'line' },
        tags: true,
    });

    const logView = blessed.log({
        parent: screen,
        label: ' Activity ',
        top: '60%',
        left: 0,
        width: '100%',
        height: '40%-3',
        border: { type: 'line' },
        tags: true,
        scrollback: 500,
    });

    const input = blessed.textbox({
        parent: screen,
        label: ' Command (help for a list, C-c to quit) ',
        bottom: 0,
        left: 0,
        width: '100%',
        height: 3,
        border: { type: 'line' },
        inputOnFocus: true,
    });

    // Route console output into the activity pane while the screen owns the terminal.
    const nativeLog = console.log;
    const nativeError = console.error;
    console.log = (...args: unknown[]) => {
        logView.log(args.map((arg) => (typeof arg === 'object' ? JSON.stringify(arg) : String(arg))).join(' '));
        scheduleRender();
    };
    console.error = (...args: unknown[]) => {
        const text = args.map((arg) => (typeof arg === 'object' ? JSON.stringify(arg) : String(arg))).join(' ');
        logView.log(`{red-fg}[ERROR]{/red-fg} ${text}`);
        scheduleRender();
    };

    let renderTimer: NodeJS.Timeout | null = null;
    function scheduleRender(): void {
        if (renderTimer) return;
        renderTimer = setTimeout(() => {
            renderTimer = null;
            refresh();
        }, RENDER_THROTTLE_MS);
    }

    function refresh(): void {
        jobTable.setData(jobRows(dispatcher.listJobs()));
        const lines = sessions.list().map((session) => {
            const auto = session.autoRespond ? ' {cyan-fg}auto{/cyan-fg}' : '';
            return `${session.name} {bold}${session.status}{/bold}${auto}`;
        });
        sessionView.setContent(lines.length > 0 ? lines.join('\n') : 'No sessions. Use: login <name> ...');
        screen.render();
    }

    const unsubscribeJobs = dispatcher.onJobEvent((event) => {
        const line = describeEvent(event);
        if (line) logView.log(line);
        scheduleRender();
    });
    const unsubscribeSessions = sessions.onChange(() => scheduleRender());

    input.on('submit', (value: string) => {
        input.clearValue();
        input.focus();

        const parsed = parseCommand(value);
        if (!parsed.ok) {
            logView.log(`{yellow-fg}${parsed.error}{/yellow-fg}`);
            scheduleRender();
            return;
        }

        try {
            const outcome = executeCommand(parsed.command, dispatcher);
            if (outcome.type === 'quit') {
                onQuit();
                return;
            }
            logView.log(outcome.type === 'submitted'
                ? `Submitted ${outcome.handle.kind} as ${outcome.handle.id}`
                : outcome.text);
        } catch (err) {
            logView.log(`{red-fg}[ERROR]{/red-fg} ${err instanceof Error ? err.message : String(err)}`);
        }
        scheduleRender();
    });

    screen.key(['C-c'], () => onQuit());

    refresh();
    input.focus();
    logView.log('Dashboard ready. Type "help" for commands.');
    screen.render();

    return {
        stop(): void {
            unsubscribeJobs();
            unsubscribeSessions();
            if (renderTimer) clearTimeout(renderTimer);
            console.log = nativeLog;
            console.error = nativeError;
            screen.destroy();
        },
    };
}
