// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: relaydesk [command] [options]

Commands:
  serve                Start the worker runtime and the HTTP/WebSocket control plane
  tui                  Open the terminal dashboard (default when no command is given)
  session login <name> Create a session and complete the login interactively
  session list         List stored sessions and their status
  jobs history         Show terminal jobs recorded in the history table
  profile <subcommand> Manage named profiles (list/show/create/update/delete)
  logs                 Print today's log file

Options:
  --help, -h           Show this help message
  --follow, -f         Keep printing new log lines (logs only)
  --json               Output in machine-readable JSON format (jobs history, profile, session list)
  --limit <n>          Number of history entries (jobs history only)
  --session <name>     Filter history by session (jobs history only)

Examples:
  relaydesk serve
  relaydesk session login main --api-id 12345 --api-hash test-hash --phone +15550001111
  relaydesk jobs history --limit 20 --session main
  relaydesk profile create outreach '{"minDelayMs":3000}'
  relaydesk profile show outreach
  relaydesk logs --follow
`.trim();

const KNOWN_COMMANDS = new Set(['serve', 'tui', 'session', 'jobs', 'profile', 'logs']);

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    if (!argv.includes('--help') && !argv.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
    if (argv.length === 0) return false;

    const command = argv[0];
    if (KNOWN_COMMANDS.has(command) || command.startsWith('--')) {
        return false;
    }

    console.error(`[RelayDesk] Unknown command: '${command}'`);
    console.error(`Run 'relaydesk --help' to see available commands.`);
    process.exitCode = 1;
    return true;
}

/** Value following `--name` in argv, if any. */
export function readOption(argv: string[], name: string): string | undefined {
    const index = argv.indexOf(name);
    if (index < 0 || index + 1 >= argv.length) return undefined;
    const value = argv[index + 1];
    return value.startsWith('--') ? undefined : value;
}
