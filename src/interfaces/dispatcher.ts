import type { TaskBridge, JobRef } from '../services/task-bridge.js';
import type { TaskRegistry } from '../services/task-registry.js';
import type { DrainReport, WorkerRuntime } from '../services/worker-runtime.js';
import type { SessionManager } from '../services/session-manager.js';
import type { AutoResponder } from '../services/auto-responder.js';
import type { MaintenanceScheduler } from '../services/maintenance-scheduler.js';
import type { RateLimiter, RateLimitPolicy } from '../services/rate-limiter.js';
import {
  classifyFailure,
  isRetryable,
  JobCancelledError,
  JobNotFoundError,
  ValidationError,
} from '../types/errors.js';
import type {
  AutoRespondResult,
  BulkItemOutcome,
  BulkSummary,
  DeliveryResult,
  DialogList,
  JobContext,
  JobEventListener,
  JobFilter,
  JobHandle,
  JobKind,
  JobSnapshot,
  ParticipantList,
  SessionStepResult,
} from '../types/job.js';
import type { ProtocolClient, ProtocolUser } from '../types/protocol.js';
import type { SessionSnapshot } from '../types/session.js';
import { withRetry, type RetryPolicy } from '../utils/retry.js';
import { logThought } from '../utils/logger.js';

const PHONE_PATTERN = /^\+?\d{5,15}$/;

const DEFAULT_MAX_BULK_ITEMS = 200;
const DEFAULT_AWAIT_TIMEOUT_MS = 120_000;
const DEFAULT_DRAIN_GRACE_MS = 5_000;

export interface CreateSessionInput {
  name: string;
  apiId: number;
  apiHash: string;
  phone: string;
}

export interface DispatcherDeps {
  bridge: TaskBridge;
  registry: TaskRegistry;
  runtime: WorkerRuntime;
  sessions: SessionManager;
  limiter: RateLimiter;
  autoResponder: AutoResponder;
  scheduler?: MaintenanceScheduler;
}

export interface DispatcherOptions {
  retry?: RetryPolicy;
  maxBulkItems?: number;
  awaitTimeoutMs?: number;
  drainGraceMs?: number;
}

type BulkStep = (client: ProtocolClient, item: string) => Promise<Pick<BulkItemOutcome, 'registered'>>;

interface RateTurn {
  limiter: RateLimiter;
  session: string;
  kind: JobKind;
}

/**
 * Operation facade for every surface (TUI, CLI, HTTP).
 *
 * Each operation validates its input synchronously, throws `ValidationError`
 * without creating a job when the input is bad, and otherwise returns a
 * `JobHandle` at once. All protocol work runs inside the worker runtime.
 */
export class Dispatcher {
  readonly #bridge: TaskBridge;
  readonly #registry: TaskRegistry;
  readonly #runtime: WorkerRuntime;
  readonly #sessions: SessionManager;
  readonly #limiter: RateLimiter;
  readonly #autoResponder: AutoResponder;
  readonly #scheduler?: MaintenanceScheduler;
  readonly #retry: RetryPolicy;
  readonly #maxBulkItems: number;
  readonly #awaitTimeoutMs: number;
  readonly #drainGraceMs: number;
  #shutdown: Promise<DrainReport> | null = null;

  constructor(deps: DispatcherDeps, options: DispatcherOptions = {}) {
    this.#bridge = deps.bridge;
    this.#registry = deps.registry;
    this.#runtime = deps.runtime;
    this.#sessions = deps.sessions;
    this.#limiter = deps.limiter;
    this.#autoResponder = deps.autoResponder;
    this.#scheduler = deps.scheduler;
    this.#retry = options.retry ?? {};
    this.#maxBulkItems = Math.max(1, options.maxBulkItems ?? DEFAULT_MAX_BULK_ITEMS);
    this.#awaitTimeoutMs = options.awaitTimeoutMs ?? DEFAULT_AWAIT_TIMEOUT_MS;
    this.#drainGraceMs = options.drainGraceMs ?? DEFAULT_DRAIN_GRACE_MS;
  }

  get maxBulkItems(): number {
    return this.#maxBulkItems;
  }

  // ── Sessions ───────────────────────────────────────────────────────────────

  /**
   * Register the slot now; connecting and requesting the login code run as a
   * job. Re-creating an existing session swaps its credentials inside that job.
   */
  createSession(input: CreateSessionInput): JobHandle {
    const hints: string[] = [];
    requireText(hints, input.name, 'Session name');
    requirePositiveInteger(hints, input.apiId, 'API id');
    requireText(hints, input.apiHash, 'API hash');
    requirePhone(hints, input.phone, 'Phone number');
    throwIfInvalid('Session creation', hints);

    const name = input.name.trim();
    this.#sessions.register({
      name,
      apiId: input.apiId,
      apiHash: input.apiHash.trim(),
      phone: input.phone.trim(),
    });

    return this.#bridge.dispatch(
      'session-create',
      async (ctx) => {
        ctx.checkpoint();
        if (!(await this.#sessions.applyRegistration(name))) {
          this.#autoResponder.disable(name);
        }
        return this.#connect(ctx, name);
      },
      {
        label: `Connect session ${name}`,
        sessionName: name,
      },
    );
  }

  /** Reconnect a restored session with its stored login. */
  reconnectSession(name: string): JobHandle {
    const session = this.#requireSession('Session reconnect', name);
    return this.#bridge.dispatch('session-create', (ctx) => this.#connect(ctx, session), {
      label: `Reconnect session ${session}`,
      sessionName: session,
    });
  }

  authorizeSession(name: string, code: string, password?: string): JobHandle {
    const hints: string[] = [];
    requireText(hints, name, 'Session name');
    requireText(hints, code, 'Login code');
    if (password !== undefined && (typeof password !== 'string' || password.length === 0)) {
      hints.push('Password must be a non-empty string when given.');
    }
    this.#requireKnownSession(hints, name);
    throwIfInvalid('Session authorization', hints);

    const session = name.trim();
    return this.#bridge.dispatch(
      'session-authorize',
      async (ctx): Promise<SessionStepResult> => {
        ctx.checkpoint();
        const status = await this.#protocolCall(
          `authorize ${session}`,
          () => this.#sessions.authorize(session, code.trim(), password),
          ctx.signal,
        );
        if (status === 'authenticated') {
          this.#resumeAutoResponder(session);
        }
        return { type: 'session', session, status };
      },
      { label: `Authorize session ${session}`, sessionName: session },
    );
  }

  disconnectSession(name: string): JobHandle {
    const session = this.#requireSession('Session disconnect', name);
    return this.#bridge.dispatch(
      'session-disconnect',
      async (ctx): Promise<SessionStepResult> => {
        ctx.checkpoint();
        this.#autoResponder.disable(session);
        const status = await this.#sessions.disconnect(session);
        return { type: 'session', session, status };
      },
      { label: `Disconnect session ${session}`, sessionName: session },
    );
  }

  /** Disconnect, then drop the slot and its stored login. */
  removeSession(name: string): JobHandle {
    const session = this.#requireSession('Session removal', name);
    return this.#bridge.dispatch(
      'session-disconnect',
      async (ctx): Promise<SessionStepResult> => {
        ctx.checkpoint();
        this.#autoResponder.disable(session);
        const status = await this.#sessions.disconnect(session);
        this.#sessions.forget(session);
        await logThought(`[Dispatcher] Session '${session}' removed.`);
        return { type: 'session', session, status };
      },
      { label: `Remove session ${session}`, sessionName: session },
    );
  }

  listSessions(): SessionSnapshot[] {
    return this.#sessions.list();
  }

  // ── Messaging ──────────────────────────────────────────────────────────────

  sendMessage(session: string, target: string, text: string): JobHandle {
    const hints: string[] = [];
    requireText(hints, session, 'Session name');
    requireText(hints, target, 'Target');
    requireText(hints, text, 'Message text');
    this.#requireKnownSession(hints, session);
    throwIfInvalid('Send message', hints);

    const name = session.trim();
    const recipient = target.trim();
    return this.#bridge.dispatch(
      'send-message',
      async (ctx): Promise<DeliveryResult> => {
        const client = this.#sessions.requireClient(name);
        ctx.checkpoint();
        await this.#limiter.waitTurn(name, 'send-message', ctx.signal);
        await this.#protocolCall(
          `send-message ${recipient}`,
          () => client.sendMessage(recipient, text),
          ctx.signal,
          { limiter: this.#limiter, session: name, kind: 'send-message' },
        );
        ctx.reportProgress(1, 1);
        return { type: 'delivery', target: recipient };
      },
      { label: `Send message to ${recipient}`, sessionName: name, total: 1 },
    );
  }

  /**
   * Send `text` to every target, one rate-limited step per item.
   * `delayConfig` overrides the pacing bounds for this job only.
   */
  bulkSend(session: string, targets: string[], text: string, delayConfig?: Partial<RateLimitPolicy>): JobHandle {
    const hints: string[] = [];
    requireText(hints, session, 'Session name');
    this.#requireItems(hints, targets, 'Targets');
    requireText(hints, text, 'Message text');
    if (delayConfig) {
      for (const [key, value] of Object.entries(delayConfig)) {
        if (value !== undefined && (typeof value !== 'number' || !Number.isFinite(value) || value < 0)) {
          hints.push(`Delay setting '${key}' must be a non-negative number.`);
        }
      }
    }
    this.#requireKnownSession(hints, session);
    throwIfInvalid('Bulk send', hints);

    const name = session.trim();
    const items = targets.map((target) => target.trim());
    const limiter = delayConfig ? this.#limiter.withPolicy(delayConfig) : this.#limiter;

    return this.#bridge.dispatch(
      'bulk-send',
      (ctx) => this.#runBulk(ctx, name, items, 'bulk-send', limiter, async (client, target) => {
        await client.sendMessage(target, text);
        return {};
      }),
      { label: `Bulk send to ${items.length} targets`, sessionName: name, total: items.length },
    );
  }

  // ── Discovery ──────────────────────────────────────────────────────────────

  /** Members of one chat; `limit` is clamped to the bulk ceiling. */
  getParticipants(session: string, chat: string, limit: number): JobHandle {
    const hints: string[] = [];
    requireText(hints, session, 'Session name');
    requireText(hints, chat, 'Chat');
    requirePositiveInteger(hints, limit, 'Limit');
    this.#requireKnownSession(hints, session);
    throwIfInvalid('Participant listing', hints);

    const name = session.trim();
    const source = chat.trim();
    const effectiveLimit = Math.min(limit, this.#maxBulkItems);

    return this.#bridge.dispatch(
      'parse-users',
      async (ctx): Promise<ParticipantList> => {
        const client = this.#sessions.requireClient(name);
        ctx.checkpoint();
        await this.#limiter.waitTurn(name, 'parse-users', ctx.signal);
        const users = await this.#protocolCall(
          `participants ${source}`,
          () => client.getParticipants(source, effectiveLimit),
          ctx.signal,
          { limiter: this.#limiter, session: name, kind: 'parse-users' },
        );
        ctx.reportProgress(1, 1);
        return { type: 'participants', chats: [source], users, failures: [] };
      },
      { label: `Participants of ${source}`, sessionName: name, total: 1 },
    );
  }

  /** Members of several chats, merged and deduplicated by user id. */
  parseUsers(session: string, chats: string[], limit: number): JobHandle {
    const hints: string[] = [];
    requireText(hints, session, 'Session name');
    this.#requireItems(hints, chats, 'Chats');
    requirePositiveInteger(hints, limit, 'Limit');
    this.#requireKnownSession(hints, session);
    throwIfInvalid('User parsing', hints);

    const name = session.trim();
    const sources = chats.map((chat) => chat.trim());
    const effectiveLimit = Math.min(limit, this.#maxBulkItems);

    return this.#bridge.dispatch(
      'parse-users',
      async (ctx): Promise<ParticipantList> => {
        const client = this.#sessions.requireClient(name);
        const seen = new Map<string, ProtocolUser>();
        const list: ParticipantList = { type: 'participants', chats: sources, users: [], failures: [] };

        for (const [index, source] of sources.entries()) {
          list.users = [...seen.values()];
          await this.#beforeItem(ctx, name, 'parse-users', this.#limiter, list);

          try {
            const users = await this.#protocolCall(
              `participants ${source}`,
              () => client.getParticipants(source, effectiveLimit),
              ctx.signal,
              { limiter: this.#limiter, session: name, kind: 'parse-users' },
            );
            for (const user of users) {
              if (!seen.has(user.id)) seen.set(user.id, user);
            }
          } catch (err) {
            if (err instanceof JobCancelledError) {
              list.users = [...seen.values()];
              throw new JobCancelledError(err.message, list);
            }
            list.failures.push({ target: source, ok: false, error: classifyFailure(err), finishedAt: isoNow() });
          }
          ctx.reportProgress(index + 1, sources.length);
        }

        list.users = [...seen.values()];
        return list;
      },
      { label: `Parse users from ${sources.length} chats`, sessionName: name, total: sources.length },
    );
  }

  listDialogs(session: string, limit: number): JobHandle {
    const hints: string[] = [];
    requireText(hints, session, 'Session name');
    requirePositiveInteger(hints, limit, 'Limit');
    this.#requireKnownSession(hints, session);
    throwIfInvalid('Dialog listing', hints);

    const name = session.trim();
    return this.#bridge.dispatch(
      'list-dialogs',
      async (ctx): Promise<DialogList> => {
        const client = this.#sessions.requireClient(name);
        ctx.checkpoint();
        await this.#limiter.waitTurn(name, 'list-dialogs', ctx.signal);
        const dialogs = await this.#protocolCall(
          'list-dialogs',
          () => client.getDialogs(limit),
          ctx.signal,
          { limiter: this.#limiter, session: name, kind: 'list-dialogs' },
        );
        return { type: 'dialogs', dialogs };
      },
      { label: `List ${limit} dialogs`, sessionName: name },
    );
  }

  /** Check which numbers belong to an account; every item reports `registered`. */
  verifyPhone(session: string, numbers: string[]): JobHandle {
    const hints: string[] = [];
    requireText(hints, session, 'Session name');
    this.#requireItems(hints, numbers, 'Phone numbers');
    if (Array.isArray(numbers)) {
      for (const phone of numbers) {
        if (typeof phone === 'string' && phone.trim().length > 0) {
          requirePhone(hints, phone, `Phone number '${phone}'`);
        }
      }
    }
    this.#requireKnownSession(hints, session);
    throwIfInvalid('Phone verification', hints);

    const name = session.trim();
    const items = numbers.map((phone) => phone.trim());
    return this.#bridge.dispatch(
      'verify-phone',
      (ctx) => this.#runBulk(ctx, name, items, 'verify-phone', this.#limiter, async (client, phone) => ({
        registered: await client.checkPhone(phone),
      })),
      { label: `Verify ${items.length} phone numbers`, sessionName: name, total: items.length },
    );
  }

  inviteUsers(session: string, chat: string, users: string[]): JobHandle {
    const hints: string[] = [];
    requireText(hints, session, 'Session name');
    requireText(hints, chat, 'Chat');
    this.#requireItems(hints, users, 'Users');
    this.#requireKnownSession(hints, session);
    throwIfInvalid('Invite', hints);

    const name = session.trim();
    const destination = chat.trim();
    const items = users.map((user) => user.trim());
    return this.#bridge.dispatch(
      'invite',
      (ctx) => this.#runBulk(ctx, name, items, 'invite', this.#limiter, async (client, user) => {
        await client.inviteToChat(destination, user);
        return {};
      }),
      { label: `Invite ${items.length} users to ${destination}`, sessionName: name, total: items.length },
    );
  }

  toggleAutoRespond(session: string, enabled: boolean, template = ''): JobHandle {
    const hints: string[] = [];
    requireText(hints, session, 'Session name');
    if (typeof enabled !== 'boolean') {
      hints.push('Enabled flag must be a boolean.');
    }
    if (enabled) {
      requireText(hints, template, 'Reply template');
    }
    this.#requireKnownSession(hints, session);
    throwIfInvalid('Auto-respond toggle', hints);

    const name = session.trim();
    return this.#bridge.dispatch(
      'auto-respond-toggle',
      async (ctx): Promise<AutoRespondResult> => {
        ctx.checkpoint();
        if (enabled) {
          this.#autoResponder.enable(name, this.#sessions.requireClient(name), template);
          this.#sessions.setAutoRespondTemplate(name, template);
        } else {
          this.#autoResponder.disable(name);
          this.#sessions.setAutoRespondTemplate(name, null);
        }
        return { type: 'auto-respond', session: name, enabled };
      },
      { label: `${enabled ? 'Enable' : 'Disable'} auto-reply on ${name}`, sessionName: name },
    );
  }

  // ── Jobs ───────────────────────────────────────────────────────────────────

  cancelJob(id: JobRef): boolean {
    return this.#bridge.cancel(id);
  }

  getJobStatus(id: JobRef): JobSnapshot {
    const snapshot = this.#bridge.poll(id);
    if (!snapshot) {
      throw new JobNotFoundError(typeof id === 'string' ? id : id.id);
    }
    return snapshot;
  }

  listJobs(filter: JobFilter = {}): JobSnapshot[] {
    return this.#registry.list(filter);
  }

  purgeJob(id: string): boolean {
    return this.#registry.purge(id);
  }

  cleanupJobs(): number {
    return this.#registry.cleanup();
  }

  awaitResult(ref: JobRef, timeoutMs: number = this.#awaitTimeoutMs): Promise<JobSnapshot> {
    return this.#bridge.awaitResult(ref, timeoutMs);
  }

  onJobEvent(listener: JobEventListener): () => void {
    return this.#bridge.onEvent(listener);
  }

  /**
   * Stop maintenance and auto-replies, drain the runtime, then disconnect
   * every session. Repeated calls share the first shutdown.
   */
  shutdown(): Promise<DrainReport> {
    this.#shutdown ??= this.#performShutdown();
    return this.#shutdown;
  }

  // ── Work units ─────────────────────────────────────────────────────────────

  async #connect(ctx: JobContext, name: string): Promise<SessionStepResult> {
    ctx.checkpoint();
    const status = await this.#protocolCall(`connect ${name}`, () => this.#sessions.connect(name), ctx.signal);
    if (status === 'authenticated') {
      this.#resumeAutoResponder(name);
    }
    return { type: 'session', session: name, status };
  }

  #resumeAutoResponder(name: string): void {
    const saved = this.#sessions.savedAutoResponders().find((entry) => entry.name === name);
    if (saved && !this.#autoResponder.isEnabled(name)) {
      this.#autoResponder.enable(name, this.#sessions.requireClient(name), saved.template);
    }
  }

  async #runBulk(
    ctx: JobContext,
    session: string,
    items: string[],
    operationKind: JobKind,
    limiter: RateLimiter,
    step: BulkStep,
  ): Promise<BulkSummary> {
    const client = this.#sessions.requireClient(session);
    const summary: BulkSummary = { type: 'bulk', total: items.length, succeeded: 0, failed: 0, items: [] };

    for (const item of items) {
      await this.#beforeItem(ctx, session, operationKind, limiter, summary);

      try {
        const extra = await this.#protocolCall(
          `${operationKind} ${item}`,
          () => step(client, item),
          ctx.signal,
          { limiter, session, kind: operationKind },
        );
        summary.items.push({ target: item, ok: true, ...extra, finishedAt: isoNow() });
        summary.succeeded++;
      } catch (err) {
        if (err instanceof JobCancelledError) {
          throw new JobCancelledError(err.message, summary);
        }
        summary.items.push({ target: item, ok: false, error: classifyFailure(err), finishedAt: isoNow() });
        summary.failed++;
      }
      ctx.reportProgress(summary.items.length, items.length);
    }

    return summary;
  }

  /** Checkpoint plus rate-limit turn; cancellation carries what was gathered so far. */
  async #beforeItem(
    ctx: JobContext,
    session: string,
    operationKind: string,
    limiter: RateLimiter,
    partial: BulkSummary | ParticipantList,
  ): Promise<void> {
    try {
      ctx.checkpoint();
      await limiter.waitTurn(session, operationKind, ctx.signal);
    } catch (err) {
      if (err instanceof JobCancelledError) {
        throw new JobCancelledError(err.message, partial);
      }
      throw err;
    }
  }

  /**
   * One protocol call under the retry policy. With a `turn`, every retry
   * first waits for a fresh rate-limit slot; the caller reserves the first.
   */
  async #protocolCall<T>(label: string, fn: () => Promise<T>, signal?: AbortSignal, turn?: RateTurn): Promise<T> {
    let attempts = 0;
    const attempt = async (): Promise<T> => {
      if (turn && attempts++ > 0) {
        await turn.limiter.waitTurn(turn.session, turn.kind, signal);
      }
      return fn();
    };
    const outcome = await withRetry(attempt, { ...this.#retry, label, shouldRetry: isRetryable, signal });
    if (outcome.ok) {
      return outcome.value;
    }
    throw outcome.cause;
  }

  async #performShutdown(): Promise<DrainReport> {
    await logThought('[Dispatcher] Shutdown requested.');
    this.#scheduler?.stopAll();
    this.#autoResponder.stopAll();

    const report = await this.#runtime.drain(this.#drainGraceMs);

    try {
      await this.#sessions.disconnectAll();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error('[Dispatcher] Session teardown failed:', message);
      await logThought(`[Dispatcher] Session teardown failed: ${message}`);
    }

    await logThought(
      `[Dispatcher] Shutdown complete: ${report.cancelledPending} pending cancelled, ` +
      `${report.settled} settled, ${report.forced} forced.`,
    );
    return report;
  }

  // ── Validation ─────────────────────────────────────────────────────────────

  #requireSession(operation: string, name: string): string {
    const hints: string[] = [];
    requireText(hints, name, 'Session name');
    this.#requireKnownSession(hints, name);
    throwIfInvalid(operation, hints);
    return name.trim();
  }

  #requireKnownSession(hints: string[], name: unknown): void {
    if (typeof name === 'string' && name.trim().length > 0 && !this.#sessions.has(name.trim())) {
      hints.push(`Session '${name.trim()}' does not exist.`);
    }
  }

  #requireItems(hints: string[], items: unknown, label: string): void {
    if (!Array.isArray(items) || items.length === 0) {
      hints.push(`${label} must be a non-empty list.`);
      return;
    }
    if (items.length > this.#maxBulkItems) {
      hints.push(`${label} may hold at most ${this.#maxBulkItems} entries (got ${items.length}).`);
    }
    if (items.some((item) => typeof item !== 'string' || item.trim().length === 0)) {
      hints.push(`${label} must not contain empty entries.`);
    }
  }
}

function requireText(hints: string[], value: unknown, label: string): void {
  if (typeof value !== 'string' || value.trim().length === 0) {
    hints.push(`${label} must be a non-empty string.`);
  }
}

function requirePositiveInteger(hints: string[], value: unknown, label: string): void {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    hints.push(`${label} must be a positive integer.`);
  }
}

function requirePhone(hints: string[], value: unknown, label: string): void {
  if (typeof value !== 'string' || !PHONE_PATTERN.test(value.trim())) {
    hints.push(`${label} must look like +15550001111 (5 to 15 digits).`);
  }
}

function throwIfInvalid(operation: string, hints: string[]): void {
  if (hints.length > 0) {
    throw new ValidationError(operation, hints);
  }
}

function isoNow(): string {
  return new Date().toISOString();
}
