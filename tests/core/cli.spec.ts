import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { handleHelpCli, handleUnknownCommand, readOption } from '../../src/core/cli.js';

// Capture console output during tests
let consoleOutput: string[] = [];
let consoleErrors: string[] = [];

beforeEach(() => {
  consoleOutput = [];
  consoleErrors = [];
  vi.spyOn(console, 'log').mockImplementation((...args) => {
    consoleOutput.push(args.join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args) => {
    consoleErrors.push(args.join(' '));
  });
  process.exitCode = undefined;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

// ── handleHelpCli ────────────────────────────────────────────────────────────

describe('handleHelpCli', () => {
  it('returns false when --help is not present', () => {
    expect(handleHelpCli([])).toBe(false);
    expect(handleHelpCli(['serve'])).toBe(false);
    expect(handleHelpCli(['jobs', 'history'])).toBe(false);
  });

  it('prints help for --help and -h', () => {
    expect(handleHelpCli(['--help'])).toBe(true);
    expect(handleHelpCli(['session', '-h'])).toBe(true);
    expect(process.exitCode).toBe(0);
    expect(consoleOutput).toHaveLength(2);
    expect(consoleOutput[0].startsWith('Usage: relaydesk [command] [options]')).toBe(true);
    expect(consoleOutput[0]).toContain('  jobs history         Show terminal jobs recorded in the history table');
  });
});

// ── handleUnknownCommand ─────────────────────────────────────────────────────

describe('handleUnknownCommand', () => {
  it('accepts every known command and bare flags', () => {
    for (const command of ['serve', 'tui', 'session', 'jobs', 'profile', 'logs', '--json']) {
      expect(handleUnknownCommand([command])).toBe(false);
    }
    expect(handleUnknownCommand([])).toBe(false);
    expect(process.exitCode).toBeUndefined();
  });

  it('rejects a mistyped command', () => {
    expect(handleUnknownCommand(['sevre'])).toBe(true);
    expect(process.exitCode).toBe(1);
    expect(consoleErrors).toEqual([
      "[RelayDesk] Unknown command: 'sevre'",
      "Run 'relaydesk --help' to see available commands.",
    ]);
  });
});

// ── readOption ───────────────────────────────────────────────────────────────

describe('readOption', () => {
  it('reads the value after a flag', () => {
    expect(readOption(['jobs', 'history', '--limit', '20'], '--limit')).toBe('20');
  });

  it('returns undefined when the flag is missing, last, or followed by another flag', () => {
    expect(readOption(['jobs', 'history'], '--limit')).toBeUndefined();
    expect(readOption(['jobs', 'history', '--limit'], '--limit')).toBeUndefined();
    expect(readOption(['jobs', '--limit', '--json'], '--limit')).toBeUndefined();
  });
});
