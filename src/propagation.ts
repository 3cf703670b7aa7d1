import { setTimeout as delay } from 'node:timers/promises';
import { parsePropagationSettings, type PropagationSettings, type PropagationSettingsInput } from './config.js';
import { normalizeHost } from './domain.js';
import { ConfigError, DnsQueryError } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { renderAnswer } from './records.js';
import { createQuery, lookup, type DnsQuery, type ResolverBackend } from './resolver.js';
import type { DnsRecordType } from './types.js';

export type PropagationStatus = 'Polling' | 'Converged' | 'TimedOut' | 'Cancelled';

/** One resolver to watch */
export interface ResolverTarget {
  id: string;
  backend?: ResolverBackend;
  server?: string;
  dohEndpoint?: string;
  /** Replaces the query built from the fields above */
  query?: DnsQuery;
}

export const DEFAULT_RESOLVERS: readonly ResolverTarget[] = [
  { id: 'system' },
  { id: 'cloudflare', server: '1.1.1.1' },
  { id: 'google', server: '8.8.8.8' },
  { id: 'quad9', server: '9.9.9.9' },
  { id: 'cloudflare-doh', backend: 'doh' },
];

export interface ResolverObservation {
  resolverId: string;
  /** Rendered answers joined with ", "; `null` when nothing was returned */
  value: string | null;
  answers: string[];
  matches: boolean;
  error?: string;
}

export interface ChangeEvent {
  resolverId: string;
  previous: string;
  current: string;
  checkCount: number;
  at: Date;
}

export interface PropagationTick {
  checkCount: number;
  observations: ResolverObservation[];
  matchCount: number;
  /** `null` when no expected value was given */
  propagationPct: number | null;
  state: PropagationStatus;
}

export interface PropagationState {
  state: PropagationStatus;
  /** Last non-empty value per resolver; `null` until one answers */
  resolverValues: Map<string, string | null>;
  checkCount: number;
  changeCount: number;
  startedAt: Date;
}

export interface PropagationReport {
  name: string;
  type: DnsRecordType;
  expectedValue?: string;
  state: PropagationStatus;
  checkCount: number;
  changeCount: number;
  propagationPct: number | null;
  resolverValues: Record<string, string | null>;
  startedAt: Date;
  finishedAt: Date;
  elapsedMs: number;
  lastTick?: PropagationTick;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface PropagationOptions extends PropagationSettingsInput {
  resolvers?: readonly ResolverTarget[];
  /** Cooperative cancellation, honoured between ticks */
  signal?: AbortSignal;
  onTick?: (tick: PropagationTick) => void;
  onChange?: (event: ChangeEvent) => void;
  /** Resolves early (without throwing) when `signal` aborts */
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

/** Wait `ms`, returning early if `signal` aborts */
export const sleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
};

/**
 * Does one rendered answer equal the expected value? Host names compare
 * case- and trailing-dot-insensitively; for MX and SRV a bare host matches
 * the answer's target.
 */
export function answerMatches(answer: string, expected: string, type: DnsRecordType): boolean {
  if (type === 'TXT') {
    return answer === expected;
  }
  const tokens = (value: string) => value.trim().split(/\s+/).map(normalizeHost);
  const got = tokens(answer);
  const want = tokens(expected);
  if (want.length === 1 && (type === 'MX' || type === 'SRV')) {
    return got[got.length - 1] === want[0];
  }
  return got.join(' ') === want.join(' ');
}

/**
 * Polls one (name, type) pair across several resolvers until every
 * resolver returns the expected value, the time budget runs out, or the
 * caller cancels.
 *
 * States: Polling → Converged | TimedOut | Cancelled. Terminal states
 * issue no further queries.
 */
export class PropagationMonitor {
  readonly settings: PropagationSettings;
  private readonly targets: { id: string; query: DnsQuery }[];
  private readonly options: PropagationOptions;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly current: PropagationState;
  private lastTick: PropagationTick | undefined;

  constructor(options: PropagationOptions) {
    this.settings = parsePropagationSettings(options);
    this.options = options;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child('propagation');

    const resolvers = options.resolvers ?? DEFAULT_RESOLVERS;
    if (resolvers.length === 0) {
      throw new ConfigError('At least one resolver is required');
    }
    const ids = new Set(resolvers.map((r) => r.id));
    if (ids.size !== resolvers.length) {
      throw new ConfigError('Resolver ids must be unique');
    }

    this.targets = resolvers.map((r) => ({
      id: r.id,
      query:
        r.query ??
        createQuery({ backend: r.backend, server: r.server, dohEndpoint: r.dohEndpoint }),
    }));
    this.current = {
      state: 'Polling',
      resolverValues: new Map(resolvers.map((r) => [r.id, null])),
      checkCount: 0,
      changeCount: 0,
      startedAt: new Date(this.now()),
    };
  }

  get state(): PropagationStatus {
    return this.current.state;
  }

  get isTerminal(): boolean {
    return this.current.state !== 'Polling';
  }

  /** Copy of the current state */
  snapshot(): PropagationState {
    return { ...this.current, resolverValues: new Map(this.current.resolverValues) };
  }

  private async observe(target: { id: string; query: DnsQuery }): Promise<ResolverObservation> {
    const { name, type, expectedValue } = this.settings;
    const outcome = await lookup(target.query, name, type);
    if (outcome instanceof DnsQueryError) {
      return { resolverId: target.id, value: null, answers: [], matches: false, error: outcome.message };
    }
    const answers = (outcome ?? []).map(renderAnswer).sort();
    return {
      resolverId: target.id,
      value: answers.length > 0 ? answers.join(', ') : null,
      answers,
      matches:
        expectedValue !== undefined && answers.some((a) => answerMatches(a, expectedValue, type)),
    };
  }

  /**
   * Query every resolver once, concurrently. In a terminal state this
   * returns the last tick without querying.
   */
  async tick(): Promise<PropagationTick> {
    if (this.isTerminal) {
      return (
        this.lastTick ?? {
          checkCount: this.current.checkCount,
          observations: [],
          matchCount: 0,
          propagationPct: null,
          state: this.current.state,
        }
      );
    }

    const observations = await Promise.all(this.targets.map((t) => this.observe(t)));
    this.current.checkCount += 1;

    for (const obs of observations) {
      if (obs.error) {
        this.log.debug('Resolver query failed', { resolver: obs.resolverId, error: obs.error });
      }
      if (obs.value === null) continue;
      const previous = this.current.resolverValues.get(obs.resolverId) ?? null;
      if (previous !== null && previous !== obs.value) {
        this.current.changeCount += 1;
        const event: ChangeEvent = {
          resolverId: obs.resolverId,
          previous,
          current: obs.value,
          checkCount: this.current.checkCount,
          at: new Date(this.now()),
        };
        this.log.info('Resolver value changed', {
          resolver: obs.resolverId,
          previous,
          current: obs.value,
        });
        this.options.onChange?.(event);
      }
      this.current.resolverValues.set(obs.resolverId, obs.value);
    }

    const matchCount = observations.filter((o) => o.matches).length;
    const converged =
      this.settings.expectedValue !== undefined && matchCount === observations.length;
    let propagationPct: number | null = null;
    if (this.settings.expectedValue !== undefined) {
      // 100 only when every resolver matches
      propagationPct = converged
        ? 100
        : Math.min(99, Math.round((100 * matchCount) / observations.length));
    }

    if (converged) {
      this.current.state = 'Converged';
    }

    const tick: PropagationTick = {
      checkCount: this.current.checkCount,
      observations,
      matchCount,
      propagationPct,
      state: this.current.state,
    };
    this.lastTick = tick;
    this.options.onTick?.(tick);
    return tick;
  }

  private timedOut(): boolean {
    const max = this.settings.maxDurationMs;
    return max !== undefined && this.elapsed() >= max;
  }

  private elapsed(): number {
    return this.now() - this.current.startedAt.getTime();
  }

  private finish(state: PropagationStatus): void {
    if (this.current.state === 'Polling') {
      this.current.state = state;
    }
  }

  /** Tick, sleep, repeat until a terminal state; then report */
  async run(): Promise<PropagationReport> {
    const { signal } = this.options;
    const pause = this.options.sleep ?? sleep;

    while (!this.isTerminal) {
      if (signal?.aborted) {
        this.finish('Cancelled');
        break;
      }
      if (this.timedOut()) {
        this.finish('TimedOut');
        break;
      }

      await this.tick();
      if (this.isTerminal) break;

      if (this.timedOut()) {
        this.finish('TimedOut');
        break;
      }
      if (signal?.aborted) {
        this.finish('Cancelled');
        break;
      }

      const max = this.settings.maxDurationMs;
      const wait =
        max === undefined
          ? this.settings.intervalMs
          : Math.max(0, Math.min(this.settings.intervalMs, max - this.elapsed()));
      await pause(wait, signal);
    }

    this.log.info('Propagation watch finished', {
      name: this.settings.name,
      type: this.settings.type,
      state: this.current.state,
      checks: this.current.checkCount,
    });
    return this.report();
  }

  report(): PropagationReport {
    const finishedAt = new Date(this.now());
    const report: PropagationReport = {
      name: this.settings.name,
      type: this.settings.type,
      state: this.current.state,
      checkCount: this.current.checkCount,
      changeCount: this.current.changeCount,
      propagationPct: this.lastTick?.propagationPct ?? null,
      resolverValues: Object.fromEntries(this.current.resolverValues),
      startedAt: this.current.startedAt,
      finishedAt,
      elapsedMs: finishedAt.getTime() - this.current.startedAt.getTime(),
    };
    if (this.settings.expectedValue !== undefined) report.expectedValue = this.settings.expectedValue;
    if (this.lastTick) report.lastTick = this.lastTick;
    return report;
  }
}

/** Watch a record until it converges, times out, or `signal` aborts */
export async function monitorPropagation(options: PropagationOptions): Promise<PropagationReport> {
  return new PropagationMonitor(options).run();
}
