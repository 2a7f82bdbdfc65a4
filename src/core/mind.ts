/**
 * Mind - the agent facade.
 *
 * Owns the belief store, self-concept, emotional matrix and cycle counter.
 * Every mutation (ingestion, cycle, peer merge, restore) is a task on one
 * StateLock, so callers on different async paths never interleave.
 */

import { randomUUID } from 'node:crypto';
import {
  DEFAULT_FRAME_SALIENCE,
  clamp,
  cloneSelfConcept,
  generateQualiaSignature,
  round3,
  type AbstractTruth,
  type EmotionState,
  type Goal,
  type Hypothesis,
  type Logger,
  type PhenomenologicalFrame,
  type SelfConcept,
  type VolitionalAction,
} from '../types/index.js';
import type { ContinuitySnapshot, ContinuityStore } from '../storage/index.js';
import { SNAPSHOT_VERSION } from '../storage/index.js';
import {
  BeliefStore,
  SURPRISE_INFLUENCE,
  SURPRISE_WEIGHT,
  cloneFrame,
  cloneTruth,
  type MergeResult,
} from './belief-store.js';
import { CognitiveCycle, type CognitiveCycleConfig } from './cognitive-cycle.js';
import { EmotionalMatrix } from './emotional-matrix.js';
import { errorMessage } from './errors.js';
import { inferEmotionalResonance, interpretRawInput } from './interpretation.js';
import { StateLock } from './state-lock.js';
import { createTraceContext, withTraceContext } from './trace-context.js';

/**
 * Weight of a frame's own resonance on the emotional matrix.
 */
export const RESONANCE_WEIGHT = 0.8;

/**
 * What this agent tells peers about itself.
 */
export interface Introduction {
  id: string;
  identityLabel: string;
  telos: string;
}

export type InspectKind = 'truth' | 'frame' | 'hypothesis' | 'goal';

export const INSPECT_KINDS: readonly InspectKind[] = ['truth', 'frame', 'hypothesis', 'goal'];

export type InspectResult =
  | { kind: 'truth'; record: AbstractTruth }
  | { kind: 'frame'; record: PhenomenologicalFrame }
  | { kind: 'hypothesis'; record: Hypothesis }
  | { kind: 'goal'; record: Goal };

export function isInspectKind(value: string): value is InspectKind {
  return INSPECT_KINDS.some((kind) => kind === value);
}

export interface MindDependencies {
  logger: Logger;
  continuity: ContinuityStore;
}

export interface MindConfig {
  agentId: string;
  telos: string;
  ethicalFramework: string[];
  selfConcept: SelfConcept;
  cycle?: Partial<CognitiveCycleConfig>;
}

export class Mind {
  readonly id: string;

  private readonly logger: Logger;
  private readonly continuity: ContinuityStore;
  private readonly lock = new StateLock();
  private readonly cycle: CognitiveCycle;
  private readonly store = new BeliefStore();
  private readonly emotions = new EmotionalMatrix();
  private readonly telos: string;
  private readonly ethicalFramework: readonly string[];
  private selfConcept: SelfConcept;
  private cycleCount = 0;

  constructor(deps: MindDependencies, config: MindConfig) {
    this.id = config.agentId;
    this.logger = deps.logger.child({ component: 'mind' });
    this.continuity = deps.continuity;
    this.telos = config.telos;
    this.ethicalFramework = [...config.ethicalFramework];
    this.selfConcept = cloneSelfConcept(config.selfConcept);
    this.cycle = new CognitiveCycle(deps.logger, config.cycle);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Replace in-memory state with the last saved snapshot.
   *
   * Resolves false (fresh start) when nothing was saved or the snapshot is
   * unreadable.
   */
  restore(): Promise<boolean> {
    return this.lock.run(async () => {
      let snapshot: ContinuitySnapshot | null;
      try {
        snapshot = await this.continuity.load();
      } catch (error) {
        this.logger.warn({ error: errorMessage(error) }, 'Snapshot unreadable, starting fresh');
        return false;
      }

      if (!snapshot) {
        this.logger.info('No previous snapshot, starting fresh');
        return false;
      }

      this.store.replaceAll(snapshot);
      this.selfConcept = cloneSelfConcept(snapshot.selfConcept);
      this.emotions.restore(snapshot.emotions);
      this.cycleCount = snapshot.cycleCount;

      this.logger.info(
        {
          frames: snapshot.frames.length,
          truths: snapshot.truths.length,
          hypotheses: snapshot.hypotheses.length,
          cycleCount: snapshot.cycleCount,
          savedAt: snapshot.savedAt.toISOString(),
        },
        'State restored'
      );
      return true;
    });
  }

  // ==========================================================================
  // Ingestion
  // ==========================================================================

  /**
   * Queue a raw observation. Resolves once the frame is in the store.
   */
  ingest(text: string): Promise<void> {
    return this.lock.run(() => {
      this.ingestNow(text);
    });
  }

  private ingestNow(text: string): void {
    const interpretation = interpretRawInput(text);
    const resonance = inferEmotionalResonance(text);

    const frame: PhenomenologicalFrame = {
      id: randomUUID(),
      timestamp: new Date(),
      rawInput: text,
      subjectiveInterpretation: interpretation,
      emotionalResonance: resonance,
      qualiaSignature: generateQualiaSignature(text, interpretation, resonance),
      connections: new Set(),
      salience: DEFAULT_FRAME_SALIENCE,
    };

    let surprise = 0;
    for (const violation of this.store.checkViolations(frame)) {
      surprise += violation.priorConfidence;
      this.emotions.modulate(SURPRISE_INFLUENCE, SURPRISE_WEIGHT);
      this.logger.info(
        { hypothesisId: violation.hypothesis.id, confidence: round3(violation.hypothesis.confidence) },
        `Expectation violated: ${violation.hypothesis.prediction}`
      );
    }
    frame.salience = clamp(DEFAULT_FRAME_SALIENCE + surprise);

    this.store.weave(frame, this.selfConcept.activeGoals);
    this.emotions.modulate(resonance, RESONANCE_WEIGHT);

    this.logger.info(
      {
        frameId: frame.id,
        salience: round3(frame.salience),
        connections: frame.connections.size,
      },
      `New phenomenon: ${interpretation}`
    );
  }

  // ==========================================================================
  // Cognition
  // ==========================================================================

  /**
   * Run one cognitive cycle, queued behind earlier ingestions.
   *
   * Every stage runs inside one lock task. The snapshot is taken there too
   * and written afterwards; a failed write is logged and does not change
   * the result.
   */
  async runCycle(): Promise<VolitionalAction[]> {
    const { cycle, actions, snapshot } = await this.lock.run(() => {
      this.cycleCount++;
      const cycle = this.cycleCount;

      return withTraceContext(createTraceContext(`cycle_${String(cycle)}`), () => {
        this.logger.debug({ cycle }, 'Cognitive cycle started');
        const outcome = this.cycle.run({
          store: this.store,
          selfConcept: this.selfConcept,
          emotions: this.emotions,
        });

        const actions: VolitionalAction[] = outcome.action ? [outcome.action] : [];
        if (outcome.action) {
          this.logger.info(
            { cycle, intent: outcome.action.intent },
            `Decided: ${outcome.action.payload}`
          );
        }

        return { cycle, actions, snapshot: this.buildSnapshot() };
      });
    });

    await this.save(snapshot, cycle);
    return actions;
  }

  /**
   * Write the current state without running a cycle.
   * Resolves false when the write failed.
   */
  async persist(): Promise<boolean> {
    const snapshot = await this.lock.run(() => this.buildSnapshot());
    return this.save(snapshot, snapshot.cycleCount);
  }

  private async save(snapshot: ContinuitySnapshot, cycle: number): Promise<boolean> {
    try {
      await this.continuity.save(snapshot);
      this.logger.debug({ cycle }, 'State persisted');
      return true;
    } catch (error) {
      this.logger.error({ cycle, error: errorMessage(error) }, 'Failed to persist state');
      return false;
    }
  }

  private buildSnapshot(): ContinuitySnapshot {
    return {
      version: SNAPSHOT_VERSION,
      savedAt: new Date(),
      frames: this.store.listFrames(),
      truths: this.store.listTruths(),
      hypotheses: this.store.listHypotheses(),
      selfConcept: cloneSelfConcept(this.selfConcept),
      emotions: this.emotions.snapshot(),
      cycleCount: this.cycleCount,
    };
  }

  // ==========================================================================
  // Peer integration
  // ==========================================================================

  /**
   * Merge truths received from a peer, serialized with every other mutation.
   */
  mergeRemoteTruths(truths: readonly AbstractTruth[], trustWeight: number): Promise<MergeResult> {
    return this.lock.run(() => {
      const result = this.store.mergeRemoteTruths(truths, trustWeight);
      this.logger.info(
        { ...result, trustWeight },
        `Integrated ${String(truths.length)} external truths`
      );
      return result;
    });
  }

  introduction(): Introduction {
    return { id: this.id, identityLabel: this.selfConcept.identity, telos: this.telos };
  }

  // ==========================================================================
  // Read-only views (copies)
  // ==========================================================================

  summary(): string {
    const activeGoals = this.selfConcept.activeGoals.filter((goal) => goal.status === 'active');

    return [
      '--- Mind Summary ---',
      `ID: ${this.id}`,
      `Identity: ${this.selfConcept.identity}`,
      `Telos: ${this.telos}`,
      `Ethics: ${this.ethicalFramework.join('; ') || 'none'}`,
      `Cycle Count: ${String(this.cycleCount)}`,
      `Frames count: ${String(this.store.frameCount())}`,
      `Derived truths: ${String(this.store.truthCount())}`,
      `Active hypotheses: ${String(this.store.hypothesisCount())}`,
      `Active goals: ${String(activeGoals.length)}`,
      `Emotional state: ${this.emotions.describe()}`,
      '--- End Summary ---',
    ].join('\n');
  }

  listTruths(): AbstractTruth[] {
    return this.store.listTruths();
  }

  listFrames(): PhenomenologicalFrame[] {
    return this.store.listFrames();
  }

  listHypotheses(): Hypothesis[] {
    return this.store.listHypotheses();
  }

  listGoals(): Goal[] {
    return this.selfConcept.activeGoals.map((goal) => ({ ...goal }));
  }

  inspect(kind: InspectKind, id: string): InspectResult | undefined {
    switch (kind) {
      case 'truth': {
        const truth = this.store.getTruth(id);
        return truth ? { kind, record: cloneTruth(truth) } : undefined;
      }
      case 'frame': {
        const frame = this.store.getFrame(id);
        return frame ? { kind, record: cloneFrame(frame) } : undefined;
      }
      case 'hypothesis': {
        const hypothesis = this.store.getHypothesis(id);
        return hypothesis ? { kind, record: { ...hypothesis } } : undefined;
      }
      case 'goal': {
        const goal = this.selfConcept.activeGoals.find((g) => g.id === id);
        return goal ? { kind, record: { ...goal } } : undefined;
      }
    }
  }

  getSelfConcept(): SelfConcept {
    return cloneSelfConcept(this.selfConcept);
  }

  getEmotions(): EmotionState {
    return this.emotions.snapshot();
  }

  getCycleCount(): number {
    return this.cycleCount;
  }

  getTelos(): string {
    return this.telos;
  }

  /**
   * Resolves once every queued ingestion, cycle and merge has settled.
   */
  idle(): Promise<void> {
    return this.lock.idle();
  }
}

/**
 * Factory function for creating a mind.
 */
export function createMind(deps: MindDependencies, config: MindConfig): Mind {
  return new Mind(deps, config);
}
