import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { getDailyLogPath } from '../utils/logger.js';

/**
 * Handle the `logs` command.
 * Reads or tails today's log file.
 */
export async function handleLogsCli(argv: string[], now: Date = new Date()): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const follow = argv.includes('--follow') || argv.includes('-f');
    const logPath = getDailyLogPath(now);
    const dateIso = now.toISOString().slice(0, 10);

    if (!fs.existsSync(logPath)) {
        console.error(`[RelayDesk Logs] No logs found for today (${dateIso}) at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (follow) {
        console.log(`[RelayDesk Logs] Following logs from ${logPath}...\n`);
        tailFile(logPath);
    } else {
        const contents = await fsPromises.readFile(logPath, 'utf8');
        process.stdout.write(contents);
        process.exitCode = 0;
    }

    return true;
}

/**
 * Tail a file similar to `tail -f`.
 */
function tailFile(filePath: string): void {
    let position = fs.statSync(filePath).size;
    // Last 4KB for context.
    const startPos = Math.max(0, position - 4096);

    if (startPos < position) {
        const initialStream = fs.createReadStream(filePath, { start: startPos, encoding: 'utf8' });
        initialStream.pipe(process.stdout);
    }

    try {
        fs.watch(filePath, (eventType) => {
            if (eventType !== 'change') return;

            const stats = fs.statSync(filePath);
            if (stats.size > position) {
                const stream = fs.createReadStream(filePath, {
                    start: position,
                    end: stats.size,
                    encoding: 'utf8',
                });
                stream.on('data', (chunk) => {
                    process.stdout.write(chunk);
                });
                position = stats.size;
            } else if (stats.size < position) {
                // Truncated or rolled over.
                position = stats.size;
            }
        });
    } catch (err) {
        console.error(`[RelayDesk Logs] Failed to watch file: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
    }
}
