import type { Dispatcher } from './dispatcher.js';
import { ValidationError } from '../types/errors.js';
import type { JobHandle } from '../types/job.js';

export type TuiCommand =
  | { name: 'login'; session: string; apiId: number; apiHash: string; phone: string }
  | { name: 'code'; session: string; code: string; password?: string }
  | { name: 'reconnect' | 'disconnect' | 'remove'; session: string }
  | { name: 'send'; session: string; target: string; text: string }
  | { name: 'bulk'; session: string; targets: string[]; text: string }
  | { name: 'participants'; session: string; chat: string; limit: number }
  | { name: 'parse'; session: string; chats: string[]; limit: number }
  | { name: 'dialogs'; session: string; limit: number }
  | { name: 'verify'; session: string; numbers: string[] }
  | { name: 'invite'; session: string; chat: string; users: string[] }
  | { name: 'auto'; session: string; enabled: boolean; template: string }
  | { name: 'cancel' | 'purge'; jobId: string }
  | { name: 'cleanup' | 'help' | 'quit' };

export type ParseResult = { ok: true; command: TuiCommand } | { ok: false; error: string };

export const DEFAULT_LIST_LIMIT = 100;

export const TUI_HELP = [
  'login <name> <apiId> <apiHash> <phone>   create a session and request a code',
  'code <name> <code> [password]            finish the login',
  'reconnect|disconnect|remove <name>',
  'send <name> <target> <text...>',
  'bulk <name> <t1,t2,...> <text...>',
  'participants <name> <chat> [limit]',
  'parse <name> <c1,c2,...> [limit]',
  'dialogs <name> [limit]',
  'verify <name> <p1,p2,...>',
  'invite <name> <chat> <u1,u2,...>',
  'auto <name> on <template...> | auto <name> off',
  'cancel <jobId> | purge <jobId> | cleanup | help | quit',
];

function splitList(value: string): string[] {
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

function parseLimit(value: string | undefined): number {
  return value === undefined ? DEFAULT_LIST_LIMIT : Number(value);
}

function usage(name: string): ParseResult {
  const line = TUI_HELP.find((entry) => entry.startsWith(name)) ?? name;
  return { ok: false, error: `Usage: ${line.split('   ')[0].trim()}` };
}

/** Parse one line typed into the command box. Pure; never touches the dispatcher. */
export function parseCommand(line: string): ParseResult {
  const words = line.trim().split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) {
    return { ok: false, error: 'Type a command, or "help".' };
  }

  const [name, ...args] = words;
  const rest = (from: number): string => args.slice(from).join(' ');

  switch (name) {
    case 'login':
      if (args.length !== 4) return usage(name);
      return { ok: true, command: { name, session: args[0], apiId: Number(args[1]), apiHash: args[2], phone: args[3] } };
    case 'code':
      if (args.length < 2 || args.length > 3) return usage(name);
      return { ok: true, command: { name, session: args[0], code: args[1], password: args[2] } };
    case 'reconnect':
    case 'disconnect':
    case 'remove':
      if (args.length !== 1) return usage('reconnect');
      return { ok: true, command: { name, session: args[0] } };
    case 'send':
      if (args.length < 3) return usage(name);
      return { ok: true, command: { name, session: args[0], target: args[1], text: rest(2) } };
    case 'bulk':
      if (args.length < 3) return usage(name);
      return { ok: true, command: { name, session: args[0], targets: splitList(args[1]), text: rest(2) } };
    case 'participants':
      if (args.length < 2 || args.length > 3) return usage(name);
      return { ok: true, command: { name, session: args[0], chat: args[1], limit: parseLimit(args[2]) } };
    case 'parse':
      if (args.length < 2 || args.length > 3) return usage(name);
      return { ok: true, command: { name, session: args[0], chats: splitList(args[1]), limit: parseLimit(args[2]) } };
    case 'dialogs':
      if (args.length < 1 || args.length > 2) return usage(name);
      return { ok: true, command: { name, session: args[0], limit: parseLimit(args[1]) } };
    case 'verify':
      if (args.length !== 2) return usage(name);
      return { ok: true, command: { name, session: args[0], numbers: splitList(args[1]) } };
    case 'invite':
      if (args.length !== 3) return usage(name);
      return { ok: true, command: { name, session: args[0], chat: args[1], users: splitList(args[2]) } };
    case 'auto':
      if (args.length >= 2 && args[1] === 'off') {
        return { ok: true, command: { name, session: args[0], enabled: false, template: '' } };
      }
      if (args.length >= 3 && args[1] === 'on') {
        return { ok: true, command: { name, session: args[0], enabled: true, template: rest(2) } };
      }
      return usage(name);
    case 'cancel':
    case 'purge':
      if (args.length !== 1) return usage('cancel');
      return { ok: true, command: { name, jobId: args[0] } };
    case 'cleanup':
    case 'help':
    case 'quit':
      return { ok: true, command: { name } };
    default:
      return { ok: false, error: `Unknown command '${name}'. Type "help".` };
  }
}

export type CommandOutcome =
  | { type: 'submitted'; handle: JobHandle }
  | { type: 'message'; text: string }
  | { type: 'quit' };

/**
 * Run a parsed command. Every protocol operation is submitted and returned as
 * a handle right away; progress arrives through job events.
 */
export function executeCommand(command: TuiCommand, dispatcher: Dispatcher): CommandOutcome {
  try {
    switch (command.name) {
      case 'login':
        return submitted(dispatcher.createSession({
          name: command.session,
          apiId: command.apiId,
          apiHash: command.apiHash,
          phone: command.phone,
        }));
      case 'code':
        return submitted(dispatcher.authorizeSession(command.session, command.code, command.password));
      case 'reconnect':
        return submitted(dispatcher.reconnectSession(command.session));
      case 'disconnect':
        return submitted(dispatcher.disconnectSession(command.session));
      case 'remove':
        return submitted(dispatcher.removeSession(command.session));
      case 'send':
        return submitted(dispatcher.sendMessage(command.session, command.target, command.text));
      case 'bulk':
        return submitted(dispatcher.bulkSend(command.session, command.targets, command.text));
      case 'participants':
        return submitted(dispatcher.getParticipants(command.session, command.chat, command.limit));
      case 'parse':
        return submitted(dispatcher.parseUsers(command.session, command.chats, command.limit));
      case 'dialogs':
        return submitted(dispatcher.listDialogs(command.session, command.limit));
      case 'verify':
        return submitted(dispatcher.verifyPhone(command.session, command.numbers));
      case 'invite':
        return submitted(dispatcher.inviteUsers(command.session, command.chat, command.users));
      case 'auto':
        return submitted(dispatcher.toggleAutoRespond(command.session, command.enabled, command.template));
      case 'cancel':
        return {
          type: 'message',
          text: dispatcher.cancelJob(command.jobId)
            ? `Cancellation requested for ${command.jobId}.`
            : `Job ${command.jobId} is not running.`,
        };
      case 'purge':
        return {
          type: 'message',
          text: dispatcher.purgeJob(command.jobId)
            ? `Job ${command.jobId} purged.`
            : `Job ${command.jobId} is unknown or still active.`,
        };
      case 'cleanup':
        return { type: 'message', text: `Removed ${dispatcher.cleanupJobs()} finished jobs.` };
      case 'help':
        return { type: 'message', text: TUI_HELP.join('\n') };
      case 'quit':
        return { type: 'quit' };
    }
  } catch (err) {
    if (err instanceof ValidationError) {
      return { type: 'message', text: err.message };
    }
    throw err;
  }
}

function submitted(handle: JobHandle): CommandOutcome {
  return { type: 'submitted', handle };
}
