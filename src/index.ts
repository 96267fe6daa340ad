import 'dotenv/config';
import { createRelayDesk, type RelayDesk } from './core/bootstrap.js';
import { handleHelpCli, handleUnknownCommand } from './core/cli.js';
import { handleHistoryCli } from './core/history-cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { handleProfileCli } from './core/profile-cli.js';
import { handleSessionCli } from './core/session-cli.js';
import { JobEventProducer } from './api/job-event-producer.js';
import { startApiServer } from './api/router.js';
import { WsHub } from './api/websocket-hub.js';
import { startTUI } from './interfaces/tui-dashboard.js';
import { JobHistory } from './services/job-history.js';
import { ProfileStore } from './services/profile-store.js';
import { resolveConfig } from './config/json-config.js';
import { logThought } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── Early one-shot CLI commands (bypass service startup) ─────────────────────

if (handleHelpCli(argv) || handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (await handleLogsCli(argv)) {
    if (!argv.includes('--follow') && !argv.includes('-f')) {
        process.exit(process.exitCode ?? 0);
    }
} else if (handleProfileCli(argv, new ProfileStore())) {
    process.exit(process.exitCode ?? 0);
} else if (handleHistoryCli(argv, new JobHistory(resolveConfig().runtime.historyLimit))) {
    process.exit(process.exitCode ?? 0);
} else if (argv[0] === 'session') {
    const desk = createRelayDesk({ scheduleMaintenance: false });
    await handleSessionCli(argv, { dispatcher: desk.dispatcher });
    await desk.shutdown();
    process.exit(process.exitCode ?? 0);
} else if (argv[0] === 'serve') {
    runServer(createRelayDesk());
} else {
    runDashboard(createRelayDesk());
}

// ── Long-running modes ───────────────────────────────────────────────────────

function runServer(desk: RelayDesk): void {
    const wsHub = new WsHub();
    const producer = new JobEventProducer({
        hub: wsHub,
        bridge: desk.bridge,
        registry: desk.registry,
        runtime: desk.runtime,
        sessions: desk.sessions,
        autoResponder: desk.autoResponder,
        scheduler: desk.scheduler,
    });
    producer.start();

    const server = startApiServer({
        dispatcher: desk.dispatcher,
        history: desk.history,
        registry: desk.registry,
        runtime: desk.runtime,
        sessions: desk.sessions,
        autoResponder: desk.autoResponder,
        scheduler: desk.scheduler,
        wsHub,
    }, desk.config.api.port);

    const stop = (signal: string): void => {
        console.log(`[RelayDesk] ${signal} received, shutting down...`);
        producer.stop();
        wsHub.stop();
        server.close();
        desk.shutdown()
            .then((report) => logThought(`[RelayDesk] Stopped after ${report.settled} settled jobs.`))
            .catch((err: unknown) => {
                console.error('[RelayDesk] Shutdown failed:', err instanceof Error ? err.message : String(err));
                process.exitCode = 1;
            })
            .finally(() => process.exit());
    };

    process.once('SIGINT', () => stop('SIGINT'));
    process.once('SIGTERM', () => stop('SIGTERM'));
}

function runDashboard(desk: RelayDesk): void {
    let stopping = false;
    const tui = startTUI(desk, () => {
        if (stopping) return;
        stopping = true;
        console.log('Shutting down, waiting for running jobs...');
        desk.shutdown()
            .catch((err: unknown) => {
                console.error('[RelayDesk] Shutdown failed:', err instanceof Error ? err.message : String(err));
                process.exitCode = 1;
            })
            .finally(() => {
                tui.stop();
                process.exit();
            });
    });
}
