import type { Logger, VolitionalAction } from '../types/index.js';
import { errorMessage } from './errors.js';

/**
 * Anything that can run a cognitive cycle.
 */
export interface CycleRunner {
  runCycle(): Promise<VolitionalAction[]>;
}

export interface CycleLoopConfig {
  /** Delay between cycle starts in ms (default: 6000) */
  intervalMs: number;
  /** Delay before the first cycle in ms (default: 2000) */
  initialDelayMs: number;
}

const DEFAULT_CONFIG: CycleLoopConfig = {
  intervalMs: 6_000,
  initialDelayMs: 2_000,
};

/**
 * CycleLoop - background cognition heartbeat.
 *
 * The next tick is scheduled only after the current one finishes, so a
 * slow cycle delays the cadence instead of stacking up runs.
 */
export class CycleLoop {
  private readonly runner: CycleRunner;
  private readonly logger: Logger;
  private readonly config: CycleLoopConfig;
  private readonly onActions: (actions: VolitionalAction[]) => void;
  private running = false;
  private tickTimeout: ReturnType<typeof setTimeout> | null = null;
  private tickCount = 0;

  constructor(
    runner: CycleRunner,
    logger: Logger,
    onActions: (actions: VolitionalAction[]) => void,
    config: Partial<CycleLoopConfig> = {}
  ) {
    this.runner = runner;
    this.logger = logger.child({ component: 'cycle-loop' });
    this.onActions = onActions;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  start(): void {
    if (this.running) {
      this.logger.warn('Cycle loop already running');
      return;
    }

    this.running = true;
    this.logger.info(
      { intervalMs: this.config.intervalMs, initialDelayMs: this.config.initialDelayMs },
      'Cycle loop started'
    );
    this.scheduleTick(this.config.initialDelayMs);
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;

    if (this.tickTimeout) {
      clearTimeout(this.tickTimeout);
      this.tickTimeout = null;
    }

    this.logger.info({ tickCount: this.tickCount }, 'Cycle loop stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getTickCount(): number {
    return this.tickCount;
  }

  private scheduleTick(delay: number): void {
    if (!this.running) return;

    this.tickTimeout = setTimeout(() => {
      void this.tick();
    }, delay);
  }

  private async tick(): Promise<void> {
    if (!this.running) return;

    this.tickTimeout = null;
    const tickStart = Date.now();
    this.tickCount++;

    try {
      const actions = await this.runner.runCycle();
      if (actions.length > 0) {
        this.onActions(actions);
      }
    } catch (error) {
      this.logger.error({ tick: this.tickCount, error: errorMessage(error) }, 'Cycle failed');
    }

    const elapsed = Date.now() - tickStart;
    this.scheduleTick(Math.max(0, this.config.intervalMs - elapsed));
  }
}

export function createCycleLoop(
  runner: CycleRunner,
  logger: Logger,
  onActions: (actions: VolitionalAction[]) => void,
  config?: Partial<CycleLoopConfig>
): CycleLoop {
  return new CycleLoop(runner, logger, onActions, config);
}
