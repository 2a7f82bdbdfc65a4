import { describe, it, expect, beforeEach } from 'vitest';
import { BeliefStore, SIMILARITY_THRESHOLD } from '../../../src/core/belief-store.js';
import {
  createFrame,
  createGoal,
  createHypothesis,
  createTruth,
} from '../../helpers/factories.js';

const EXPECTATION = "After a 'Hello' signal, the external entity is expecting acknowledgement.";

describe('BeliefStore', () => {
  let store: BeliefStore;

  beforeEach(() => {
    store = new BeliefStore();
  });

  describe('checkViolations', () => {
    it('halves and flags an expectation the frame does not meet', () => {
      const hypothesis = createHypothesis({ prediction: EXPECTATION, confidence: 0.9 });
      store.addHypothesis(hypothesis);

      const violations = store.checkViolations(createFrame({ rawInput: 'Random noise' }));

      expect(violations).toHaveLength(1);
      expect(violations[0]?.priorConfidence).toBe(0.9);
      expect(store.getHypothesis(hypothesis.id)).toMatchObject({
        isViolated: true,
        confidence: 0.45,
      });
    });

    it('is satisfied by a response or a greeting', () => {
      store.addHypothesis(createHypothesis({ prediction: EXPECTATION }));

      expect(store.checkViolations(createFrame({ rawInput: 'a response arrives' }))).toEqual([]);
      expect(store.checkViolations(createFrame({ rawInput: 'Hello again' }))).toEqual([]);
    });

    it('ignores hypotheses without an expectation', () => {
      store.addHypothesis(createHypothesis({ prediction: 'Numbers will continue.' }));

      expect(store.checkViolations(createFrame({ rawInput: 'noise' }))).toEqual([]);
    });

    it('never violates the same hypothesis twice', () => {
      const hypothesis = createHypothesis({ prediction: EXPECTATION, confidence: 0.8 });
      store.addHypothesis(hypothesis);

      store.checkViolations(createFrame({ rawInput: 'noise' }));
      const second = store.checkViolations(createFrame({ rawInput: 'more noise' }));

      expect(second).toEqual([]);
      expect(store.getHypothesis(hypothesis.id)?.confidence).toBe(0.4);
    });
  });

  describe('weave', () => {
    it('boosts salience when the raw text contains the last word of an active goal', () => {
      const goal = createGoal({ description: 'Decode the numeric sequence', priority: 0.3 });
      const frame = store.weave(createFrame({ rawInput: 'a sequence appears' }), [goal]);

      expect(frame.salience).toBeCloseTo(0.8);
    });

    it('clamps boosted salience at 1', () => {
      const goal = createGoal({ description: "Understand 'Hello' greeting pattern", priority: 0.9 });
      const frame = store.weave(createFrame({ rawInput: 'a pattern emerges' }), [goal]);

      expect(frame.salience).toBe(1);
    });

    it('ignores goals that are not active', () => {
      const goal = createGoal({ description: 'Find the pattern', status: 'achieved' });
      const frame = store.weave(createFrame({ rawInput: 'pattern' }), [goal]);

      expect(frame.salience).toBe(0.5);
    });

    it('links the new frame to similar existing frames only', () => {
      const near = store.weave(createFrame({ qualiaSignature: { vector: [0, 0] } }), []);
      const far = store.weave(createFrame({ qualiaSignature: { vector: [1, 0] } }), []);

      const frame = store.weave(
        createFrame({ qualiaSignature: { vector: [SIMILARITY_THRESHOLD - 0.15, 0] } }),
        []
      );

      expect([...frame.connections]).toEqual([near.id]);
      expect(store.getFrame(near.id)?.connections.size).toBe(0);
      expect(store.getFrame(far.id)?.connections.size).toBe(0);
    });

    it('does not link frames at exactly the threshold', () => {
      store.weave(createFrame({ qualiaSignature: { vector: [0] } }), []);
      const frame = store.weave(
        createFrame({ qualiaSignature: { vector: [SIMILARITY_THRESHOLD] } }),
        []
      );

      expect(frame.connections.size).toBe(0);
    });
  });

  describe('selectFocus', () => {
    it('orders by salience and keeps insertion order on ties', () => {
      const a = store.weave(createFrame({ salience: 0.5 }), []);
      const b = store.weave(createFrame({ salience: 0.9 }), []);
      const c = store.weave(createFrame({ salience: 0.5 }), []);

      expect(store.selectFocus(12).map((f) => f.id)).toEqual([b.id, a.id, c.id]);
      expect(store.selectFocus(2).map((f) => f.id)).toEqual([b.id, a.id]);
      expect(store.selectFocus(0)).toEqual([]);
    });
  });

  describe('truths', () => {
    it('deduplicates by principle', () => {
      expect(store.addTruth(createTruth({ emergentPrinciple: 'P' }))).toBe(true);
      expect(store.addTruth(createTruth({ emergentPrinciple: 'P' }))).toBe(false);
      expect(store.truthCount()).toBe(1);
    });

    it('reinforces a known principle with trust-weighted confidence', () => {
      const local = createTruth({
        id: 'local',
        coreConcept: 'Local',
        emergentPrinciple: 'P',
        confidence: 0.5,
        supportingFrames: new Set(['f1']),
      });
      store.addTruth(local);

      const result = store.mergeRemoteTruths(
        [
          createTruth({
            id: 'remote',
            coreConcept: 'Remote',
            emergentPrinciple: 'P',
            confidence: 0.5,
            supportingFrames: new Set(['f2']),
          }),
        ],
        0.6
      );

      expect(result).toEqual({ added: 0, reinforced: 1 });
      const merged = store.getTruth('local');
      expect(merged?.coreConcept).toBe('Local');
      expect(merged?.confidence).toBeCloseTo(0.8);
      expect([...(merged?.supportingFrames ?? [])].sort()).toEqual(['f1', 'f2']);
      expect(store.getTruth('remote')).toBeUndefined();
    });

    it('caps reinforced confidence at 1', () => {
      store.addTruth(createTruth({ id: 'local', emergentPrinciple: 'P', confidence: 0.9 }));
      store.mergeRemoteTruths([createTruth({ emergentPrinciple: 'P', confidence: 0.9 })], 1);

      expect(store.getTruth('local')?.confidence).toBe(1);
    });

    it('adds an unknown principle under its own id', () => {
      const result = store.mergeRemoteTruths(
        [createTruth({ id: 'remote', emergentPrinciple: 'Q', confidence: 0.7 })],
        0.6
      );

      expect(result).toEqual({ added: 1, reinforced: 0 });
      expect(store.getTruth('remote')?.confidence).toBe(0.7);
    });

    it('never duplicates or weakens truths when the same set arrives twice', () => {
      const frames = (id: string): Set<string> => new Set([id]);
      store.addTruth(
        createTruth({ id: 'local', emergentPrinciple: 'P', confidence: 0.3, supportingFrames: frames('f1') })
      );
      const remote = [
        createTruth({ id: 'p', emergentPrinciple: 'P', confidence: 0.2, supportingFrames: frames('f2') }),
        createTruth({ id: 'q', emergentPrinciple: 'Q', confidence: 0.4, supportingFrames: frames('f3') }),
      ];

      expect(store.mergeRemoteTruths(remote, 0.5)).toEqual({ added: 1, reinforced: 1 });
      const afterFirst = store.listTruths();
      expect(store.mergeRemoteTruths(remote, 0.5)).toEqual({ added: 0, reinforced: 2 });
      const afterSecond = store.listTruths();

      expect(afterSecond.map((t) => t.id)).toEqual(['local', 'q']);
      expect(afterFirst.map((t) => t.confidence)).toEqual([expect.closeTo(0.4), 0.4]);
      expect(afterSecond.map((t) => t.confidence)).toEqual([
        expect.closeTo(0.5),
        expect.closeTo(0.6),
      ]);
      expect([...(store.getTruth('local')?.supportingFrames ?? [])].sort()).toEqual(['f1', 'f2']);
      expect([...(store.getTruth('q')?.supportingFrames ?? [])]).toEqual(['f3']);
    });

    describe('from peers with different trust weights', () => {
      function mergeInOrder(localConfidence: number, weights: number[]): BeliefStore {
        const target = new BeliefStore();
        target.addTruth(
          createTruth({
            id: 'local',
            emergentPrinciple: 'P',
            confidence: localConfidence,
            supportingFrames: new Set(['f1']),
          })
        );
        weights.forEach((weight, index) => {
          target.mergeRemoteTruths(
            [
              createTruth({
                emergentPrinciple: 'P',
                confidence: 0.5,
                supportingFrames: new Set([`r${String(index)}`]),
              }),
            ],
            weight
          );
        });
        return target;
      }

      it('reaches the same confidence in either order', () => {
        const forward = mergeInOrder(0.2, [0.4, 0.8]).getTruth('local');
        const backward = mergeInOrder(0.2, [0.8, 0.4]).getTruth('local');

        expect(forward?.confidence).toBeCloseTo(0.8);
        expect(backward?.confidence).toBeCloseTo(0.8);
        expect([...(forward?.supportingFrames ?? [])].sort()).toEqual(['f1', 'r0', 'r1']);
        expect([...(backward?.supportingFrames ?? [])].sort()).toEqual(['f1', 'r0', 'r1']);
      });

      // Contributions are non-negative, so the 1.0 cap is reached in both orders
      it('caps at 1 in either order', () => {
        expect(mergeInOrder(0.7, [0.4, 0.8]).getTruth('local')?.confidence).toBe(1);
        expect(mergeInOrder(0.7, [0.8, 0.4]).getTruth('local')?.confidence).toBe(1);
      });
    });
  });

  describe('copies', () => {
    it('lists frames that do not alias stored ones', () => {
      const frame = store.weave(createFrame(), []);
      const [listed] = store.listFrames();
      listed?.connections.add('other');

      expect(store.getFrame(frame.id)?.connections.size).toBe(0);
    });

    it('replaceAll swaps in the given contents', () => {
      store.addTruth(createTruth({ emergentPrinciple: 'old' }));

      store.replaceAll({
        frames: [createFrame({ id: 'f1' })],
        truths: [createTruth({ id: 't1', emergentPrinciple: 'new' })],
        hypotheses: [createHypothesis({ id: 'h1' })],
      });

      expect(store.frameCount()).toBe(1);
      expect(store.listTruths().map((t) => t.id)).toEqual(['t1']);
      expect(store.getHypothesis('h1')).toBeDefined();
    });
  });
});
