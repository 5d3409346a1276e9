import { EventEmitter } from 'events';
import { SearchServiceConfig } from '../config';
import { ServingMode } from '../types';
import { createChildLogger } from '../utils/logger';
import { servingMode, servingModeTransitionsTotal } from '../utils/metrics';

export type TransitionReason =
  | 'lag_sla_exceeded'
  | 'error_rate_exceeded'
  | 'below_threshold'
  | 'recovery_window_clean'
  | 'regression';

export interface ModeTransition {
  from: ServingMode;
  to: ServingMode;
  reason: TransitionReason;
  at: number;
}

export interface DegradationControllerOptions extends Omit<SearchServiceConfig['degradation'], 'evaluationIntervalMs'> {
  stalenessSlaMs: number;
  evaluationIntervalMs?: number;
  /** Current invalidation lag in milliseconds */
  lagSource: () => number;
  now?: () => number;
}

interface Outcome {
  at: number;
  ok: boolean;
}

const MODE_GAUGE: Record<ServingMode, number> = {
  HEALTHY: 0,
  RECOVERING: 1,
  DEGRADED: 2,
};

/**
 * Serving-mode state machine.
 *
 * HEALTHY -> DEGRADED   lag over SLA for sustainWindowMs, or error rate over threshold
 * DEGRADED -> RECOVERING lag and error rate both back under threshold
 * RECOVERING -> HEALTHY  clean for recoveryWindowMs
 * RECOVERING -> DEGRADED on any regression
 *
 * Emits `transition` with a ModeTransition on every change.
 */
export class DegradationController extends EventEmitter {
  private mode: ServingMode = 'HEALTHY';
  private enteredAt: number;
  private lagBreachedSince: number | null = null;
  private cleanSince: number | null = null;
  private outcomes: Outcome[] = [];
  private timer: NodeJS.Timeout | null = null;
  private readonly now: () => number;
  private logger = createChildLogger({ component: 'degradation-controller' });

  constructor(private readonly options: DegradationControllerOptions) {
    super();
    this.now = options.now ?? Date.now;
    this.enteredAt = this.now();
    servingMode.set(MODE_GAUGE[this.mode]);
  }

  get state(): ServingMode {
    return this.mode;
  }

  /** Epoch millis of the last transition (or construction) */
  get since(): number {
    return this.enteredAt;
  }

  recordBackendOutcome(ok: boolean): void {
    const now = this.now();
    this.prune(now);
    this.outcomes.push({ at: now, ok });
  }

  /** Outcomes currently held for the error window */
  get retainedOutcomes(): number {
    return this.outcomes.length;
  }

  errorRate(now: number = this.now()): { rate: number; samples: number } {
    this.prune(now);
    const samples = this.outcomes.length;
    if (samples === 0) return { rate: 0, samples };
    const failures = this.outcomes.filter((outcome) => !outcome.ok).length;
    return { rate: failures / samples, samples };
  }

  evaluate(now: number = this.now()): ServingMode {
    const lag = this.options.lagSource();
    const lagBreached = lag > this.options.stalenessSlaMs;

    if (!lagBreached) {
      this.lagBreachedSince = null;
    } else if (this.lagBreachedSince === null) {
      this.lagBreachedSince = now;
    }

    const { rate, samples } = this.errorRate(now);
    const errorBreached = samples >= this.options.minSamples && rate > this.options.errorRateThreshold;
    const lagSustained = this.lagBreachedSince !== null && now - this.lagBreachedSince >= this.options.sustainWindowMs;

    switch (this.mode) {
      case 'HEALTHY':
        if (lagSustained) {
          this.transition('DEGRADED', 'lag_sla_exceeded', now, { lag });
        } else if (errorBreached) {
          this.transition('DEGRADED', 'error_rate_exceeded', now, { rate, samples });
        }
        break;

      case 'DEGRADED':
        if (!lagBreached && !errorBreached) {
          this.cleanSince = now;
          this.transition('RECOVERING', 'below_threshold', now, { lag, rate });
        }
        break;

      case 'RECOVERING':
        if (lagBreached || errorBreached) {
          this.cleanSince = null;
          this.transition('DEGRADED', 'regression', now, { lag, rate });
        } else if (this.cleanSince !== null && now - this.cleanSince >= this.options.recoveryWindowMs) {
          this.cleanSince = null;
          this.transition('HEALTHY', 'recovery_window_clean', now, { lag, rate });
        }
        break;
    }

    return this.mode;
  }

  /**
   * Evaluate on an interval. The timer does not keep the process alive.
   */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.evaluate(), this.options.evaluationIntervalMs ?? 250);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private prune(now: number): void {
    const cutoff = now - this.options.errorWindowMs;
    let drop = 0;
    while (drop < this.outcomes.length && this.outcomes[drop].at < cutoff) {
      drop++;
    }
    if (drop > 0) {
      this.outcomes.splice(0, drop);
    }
  }

  private transition(to: ServingMode, reason: TransitionReason, at: number, detail: Record<string, number>): void {
    const from = this.mode;
    this.mode = to;
    this.enteredAt = at;

    servingMode.set(MODE_GAUGE[to]);
    servingModeTransitionsTotal.inc({ from, to });

    if (to === 'DEGRADED') {
      this.logger.warn({ from, to, reason, ...detail }, `Serving mode ${from} -> ${to}`);
    } else {
      this.logger.info({ from, to, reason, ...detail }, `Serving mode ${from} -> ${to}`);
    }

    const event: ModeTransition = { from, to, reason, at };
    this.emit('transition', event);
  }
}
