import { describe, it, expect, beforeEach } from 'vitest';
import { ACTIONS } from '../../../src/core/cognitive-cycle.js';
import {
  GREETING_PREDICTION,
  GREETING_PRINCIPLE,
  NUMERIC_PREDICTION,
  NUMERIC_PRINCIPLE,
} from '../../../src/core/pattern-detectors.js';
import { isInspectKind, type Mind } from '../../../src/core/mind.js';
import {
  InMemoryContinuityStore,
  createTestMind,
  createTruth,
  type MockLogger,
} from '../../helpers/factories.js';

async function ingestAll(mind: Mind, inputs: string[]): Promise<void> {
  for (const input of inputs) {
    await mind.ingest(input);
  }
}

describe('Mind', () => {
  let mind: Mind;
  let store: InMemoryContinuityStore;
  let logger: MockLogger;

  beforeEach(() => {
    ({ mind, store, logger } = createTestMind());
  });

  describe('summary', () => {
    it('describes a fresh mind', () => {
      expect(mind.summary().split('\n')).toEqual([
        '--- Mind Summary ---',
        'ID: agent-a',
        'Identity: Unit-Test',
        'Telos: Test telos',
        'Ethics: Do no harm',
        'Cycle Count: 0',
        'Frames count: 0',
        'Derived truths: 0',
        'Active hypotheses: 0',
        'Active goals: 1',
        'Emotional state: joy: 0.50, sadness: 0.50, fear: 0.50, anger: 0.50, surprise: 0.50, disgust: 0.50, curiosity: 0.50, awe: 0.50',
        '--- End Summary ---',
      ]);
    });
  });

  describe('ingest', () => {
    it('stores a frame and feels its resonance', async () => {
      await mind.ingest('Hello there');

      const [frame] = mind.listFrames();
      expect(frame).toMatchObject({
        rawInput: 'Hello there',
        subjectiveInterpretation: 'A greeting directed at me.',
        emotionalResonance: { curiosity: 0.7, awe: 0.1 },
        salience: 0.5,
      });
      expect(frame?.qualiaSignature.vector).toHaveLength(16);

      const emotions = mind.getEmotions();
      expect(emotions.curiosity).toBe(1);
      expect(emotions.awe).toBeCloseTo(0.58);
      expect(logger.messages('info')).toContain('New phenomenon: A greeting directed at me.');
    });

    it('boosts frames that mention a goal keyword', async () => {
      await mind.ingest('a new pattern');

      expect(mind.listFrames()[0]?.salience).toBe(1);
    });

    it('links identical observations', async () => {
      await mind.ingest('Hello?');
      await mind.ingest('Hello?');

      const [first, second] = mind.listFrames();
      expect(second?.connections.has(first?.id ?? '')).toBe(true);
    });
  });

  describe('runCycle', () => {
    it('learns the greeting pattern and persists the result', async () => {
      await ingestAll(mind, ["Query received: 'Hello?'", 'Hello?', 'Hello again']);

      const actions = await mind.runCycle();

      expect(actions).toEqual([ACTIONS.respondToGreeting]);
      expect(mind.getCycleCount()).toBe(1);
      expect(mind.listTruths().map((t) => t.emergentPrinciple)).toEqual([GREETING_PRINCIPLE]);
      expect(mind.listHypotheses()).toMatchObject([
        { prediction: GREETING_PREDICTION, confidence: 0.9, isViolated: false },
      ]);
      expect(mind.getSelfConcept().understandingOfExistence).toContain(
        `- Learned: ${GREETING_PRINCIPLE}`
      );

      expect(store.saves).toBe(1);
      expect(store.last()?.cycleCount).toBe(1);
      expect(store.last()?.truths).toHaveLength(1);
    });

    it('learns a numeric stream once a second numeric input arrives', async () => {
      await mind.ingest('Data stream detected: 2,3,5,7,11,13');
      await mind.runCycle();

      expect(mind.listTruths()).toEqual([]);

      await mind.ingest('Readings 17 and 19');
      await mind.runCycle();

      expect(mind.listTruths().map((t) => t.emergentPrinciple)).toEqual([NUMERIC_PRINCIPLE]);
      const [hypothesis] = mind.listHypotheses();
      expect(hypothesis?.prediction).toBe(NUMERIC_PREDICTION);
      expect(hypothesis?.confidence).toBeCloseTo(0.56);
    });

    it('sees every ingestion queued before it', async () => {
      const pending = [mind.ingest('Hello?'), mind.ingest('Hello?'), mind.ingest('Hello?')];
      const cycle = mind.runCycle();

      await Promise.all(pending);
      await cycle;

      expect(mind.listTruths()).toHaveLength(1);
    });

    it('returns no action without active goals', async () => {
      ({ mind } = createTestMind({
        selfConcept: {
          identity: 'Idle',
          coreValues: new Set(),
          perceivedLimitations: new Set(),
          understandingOfExistence: '',
          activeGoals: [],
        },
      }));

      expect(await mind.runCycle()).toEqual([]);
    });

    it('keeps its result when the snapshot write fails', async () => {
      store.failWrites = true;
      await ingestAll(mind, ['Hello?', 'Hello?', 'Hello?']);

      const actions = await mind.runCycle();

      expect(actions).toEqual([ACTIONS.respondToGreeting]);
      expect(mind.getCycleCount()).toBe(1);
      expect(logger.messages('error')).toContain('Failed to persist state');
    });
  });

  describe('expectation violations', () => {
    beforeEach(async () => {
      await ingestAll(mind, ['Hello?', 'Hello?', 'Hello?']);
      await mind.runCycle();
    });

    it('halves the hypothesis and makes the frame salient', async () => {
      await mind.ingest('Random noise');

      const [hypothesis] = mind.listHypotheses();
      expect(hypothesis?.isViolated).toBe(true);
      expect(hypothesis?.confidence).toBe(0.45);

      const frames = mind.listFrames();
      expect(frames[frames.length - 1]?.salience).toBe(1);

      const emotions = mind.getEmotions();
      expect(emotions.fear).toBeCloseTo(0.62);
      expect(emotions.surprise).toBe(1);
      expect(logger.messages('info')).toContain(`Expectation violated: ${GREETING_PREDICTION}`);
    });

    it('is satisfied by a greeting', async () => {
      await mind.ingest('Hello once more');

      expect(mind.listHypotheses()[0]?.isViolated).toBe(false);
    });

    it('surprises only once per hypothesis', async () => {
      await mind.ingest('Random noise');
      await mind.ingest('More noise');

      const frames = mind.listFrames();
      expect(frames[frames.length - 1]?.salience).toBe(0.5);
      expect(mind.listHypotheses()[0]?.confidence).toBe(0.45);
    });
  });

  describe('persistence', () => {
    it('restores a saved mind', async () => {
      await ingestAll(mind, ['Hello?', 'Hello?', 'Hello?']);
      await mind.runCycle();

      const { mind: revived } = createTestMind({}, store);
      expect(await revived.restore()).toBe(true);

      expect(revived.getCycleCount()).toBe(1);
      expect(revived.listFrames()).toEqual(mind.listFrames());
      expect(revived.listTruths()).toEqual(mind.listTruths());
      expect(revived.listHypotheses()).toEqual(mind.listHypotheses());
      expect(revived.getEmotions()).toEqual(mind.getEmotions());
      expect(revived.getSelfConcept()).toEqual(mind.getSelfConcept());
      expect(revived.summary()).toBe(mind.summary());
    });

    it('starts fresh when nothing was saved', async () => {
      expect(await mind.restore()).toBe(false);
      expect(logger.messages('info')).toContain('No previous snapshot, starting fresh');
    });

    it('starts fresh when the snapshot is unreadable', async () => {
      store.failReads = true;

      expect(await mind.restore()).toBe(false);
      expect(logger.messages('warn')).toContain('Snapshot unreadable, starting fresh');
      expect(mind.getCycleCount()).toBe(0);
    });

    it('persists without running a cycle', async () => {
      await mind.ingest('Hello?');

      expect(await mind.persist()).toBe(true);
      expect(mind.getCycleCount()).toBe(0);
      expect(store.last()?.frames).toHaveLength(1);
    });

    it('reports a failed persist', async () => {
      store.failWrites = true;

      expect(await mind.persist()).toBe(false);
      expect(store.saves).toBe(0);
    });
  });

  describe('mergeRemoteTruths', () => {
    it('adds new principles and reinforces known ones', async () => {
      await ingestAll(mind, ['Hello?', 'Hello?', 'Hello?']);
      await mind.runCycle();

      const result = await mind.mergeRemoteTruths(
        [
          createTruth({ emergentPrinciple: GREETING_PRINCIPLE, confidence: 0.5 }),
          createTruth({ id: 'remote-1', emergentPrinciple: 'Silence is informative.', confidence: 0.4 }),
        ],
        0.6
      );

      expect(result).toEqual({ added: 1, reinforced: 1 });
      const truths = mind.listTruths();
      expect(truths).toHaveLength(2);
      expect(truths[0]?.confidence).toBe(1);
      expect(truths[1]?.id).toBe('remote-1');
    });
  });

  describe('views', () => {
    it('introduces itself', () => {
      expect(mind.introduction()).toEqual({
        id: 'agent-a',
        identityLabel: 'Unit-Test',
        telos: 'Test telos',
      });
    });

    it('inspects records by kind and id', async () => {
      await ingestAll(mind, ['Hello?', 'Hello?', 'Hello?']);
      await mind.runCycle();

      const [truth] = mind.listTruths();
      const [goal] = mind.listGoals();

      expect(mind.inspect('truth', truth?.id ?? '')).toEqual({ kind: 'truth', record: truth });
      expect(mind.inspect('goal', goal?.id ?? '')).toEqual({ kind: 'goal', record: goal });
      expect(mind.inspect('frame', 'missing')).toBeUndefined();
      expect(mind.inspect('hypothesis', 'missing')).toBeUndefined();
    });

    it('hands out copies of its self-concept', () => {
      const concept = mind.getSelfConcept();
      concept.activeGoals = [];
      concept.coreValues.add('Mischief');

      expect(mind.listGoals()).toHaveLength(1);
      expect(mind.getSelfConcept().coreValues.has('Mischief')).toBe(false);
    });

    it('recognizes inspectable kinds', () => {
      expect(isInspectKind('hypothesis')).toBe(true);
      expect(isInspectKind('emotion')).toBe(false);
    });
  });
});
