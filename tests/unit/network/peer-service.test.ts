import { describe, it, expect, afterEach, vi } from 'vitest';
import { createServer } from 'node:net';
import { Duplex } from 'node:stream';
import {
  createPeerService,
  type PeerService,
  type PeerServiceConfig,
} from '../../../src/network/peer-service.js';
import {
  createEnvelope,
  decodeEnvelope,
  decodeIntroducePayload,
  decodeShareTruthsPayload,
  encodeEnvelope,
  requestSyncEnvelope,
  shareTruthsEnvelope,
} from '../../../src/network/envelope.js';
import {
  NetworkBindError,
  RetryExhaustedError,
  ServiceStoppedError,
} from '../../../src/core/errors.js';
import type { Mind } from '../../../src/core/mind.js';
import { GREETING_PRINCIPLE, NUMERIC_PRINCIPLE } from '../../../src/core/pattern-detectors.js';
import {
  collectLines,
  createDuplexPair,
  createTestMind,
  createTruth,
  type MockLogger,
} from '../../helpers/factories.js';

interface Agent {
  mind: Mind;
  logger: MockLogger;
  service: PeerService;
}

const services: PeerService[] = [];

function createAgent(agentId: string, config: Partial<PeerServiceConfig> = {}): Agent {
  const { mind, logger } = createTestMind({ agentId });
  const service = createPeerService(mind, logger, { host: '127.0.0.1', port: 0, ...config });
  services.push(service);
  return { mind, logger, service };
}

async function learnGreeting(mind: Mind): Promise<void> {
  for (let i = 0; i < 3; i++) {
    await mind.ingest('Hello?');
  }
  await mind.runCycle();
}

async function learnNumbers(mind: Mind): Promise<void> {
  await mind.ingest('Data stream detected: 2,3,5');
  await mind.ingest('Readings 17 and 19');
  await mind.runCycle();
}

function principles(mind: Mind): string[] {
  return mind
    .listTruths()
    .map((truth) => truth.emergentPrinciple)
    .sort();
}

/**
 * Stream whose writes complete only when released, so its buffer fills.
 */
class StalledStream extends Duplex {
  readonly written: string[] = [];
  private readonly held: (() => void)[] = [];

  constructor() {
    super({ writableHighWaterMark: 1 });
  }

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.written.push(chunk.toString('utf-8').trim());
    this.held.push(() => {
      callback();
    });
  }

  override _read(): void {
    // Data arrives through push()
  }

  release(): void {
    for (const complete of this.held.splice(0)) {
      complete();
    }
  }
}

function freePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      server.close(() => {
        if (address && typeof address === 'object') {
          resolve(address.port);
        } else {
          reject(new Error('No port assigned'));
        }
      });
    });
  });
}

describe('PeerService', () => {
  afterEach(async () => {
    await Promise.all(services.splice(0).map((service) => service.stop()));
  });

  describe('over an in-process stream', () => {
    it('introduces itself on attach', () => {
      const a = createAgent('agent-a');
      const [local, remote] = createDuplexPair();
      const lines = collectLines(remote);

      a.service.attach(local);

      return vi.waitFor(() => {
        expect(lines).toHaveLength(1);
        const envelope = decodeEnvelope(lines[0] ?? '');
        expect(envelope.type).toBe('introduce');
        expect(envelope.fromAgentId).toBe('agent-a');
        expect(decodeIntroducePayload(envelope)).toEqual({
          id: 'agent-a',
          identityLabel: 'Unit-Test',
          telos: 'Test telos',
        });
      });
    });

    it('exchanges truths between two agents', async () => {
      const a = createAgent('agent-a');
      const b = createAgent('agent-b');
      await learnGreeting(a.mind);
      await learnNumbers(b.mind);
      const expected = [GREETING_PRINCIPLE, NUMERIC_PRINCIPLE].sort();

      const [endA, endB] = createDuplexPair();
      a.service.attach(endA, { label: 'to-b' });
      b.service.attach(endB, { label: 'to-a' });

      await vi.waitFor(() => {
        expect(principles(a.mind)).toEqual(expected);
        expect(principles(b.mind)).toEqual(expected);
      });
      await Promise.all([a.service.drain(), b.service.drain()]);

      expect(principles(a.mind)).toEqual(expected);
      expect(principles(b.mind)).toEqual(expected);
      expect(b.service.getKnownPeers().map((p) => p.agentId)).toEqual(['agent-a']);
      expect(b.service.getConnections()).toEqual([
        { id: expect.any(String), label: 'to-a', agentId: 'agent-a', outbound: false },
      ]);
      expect(b.logger.messages('info')).toContain('Peer introduced');
    });

    it('reinforces a shared principle with the sender trust weight', async () => {
      const a = createAgent('agent-a');
      await learnGreeting(a.mind);
      const [local] = a.mind.listTruths();
      const [stream, remote] = createDuplexPair();
      a.service.attach(stream);

      remote.write(
        encodeEnvelope(
          shareTruthsEnvelope(
            'agent-b',
            [createTruth({ emergentPrinciple: local?.emergentPrinciple ?? '', confidence: 0.1 })],
            0.5
          )
        )
      );

      await vi.waitFor(() => {
        expect(a.mind.listTruths()[0]?.confidence).toBeCloseTo(0.95);
      });
      expect(a.mind.listTruths()).toHaveLength(1);
    });

    it('answers a sync request with its truths', async () => {
      const a = createAgent('agent-a', { trustWeight: 0.75 });
      await learnGreeting(a.mind);
      const [stream, remote] = createDuplexPair();
      const lines = collectLines(remote);
      a.service.attach(stream);

      remote.write(encodeEnvelope(requestSyncEnvelope('agent-b')));

      await vi.waitFor(() => {
        expect(lines).toHaveLength(2);
      });
      const reply = decodeEnvelope(lines[1] ?? '');
      expect(reply.type).toBe('shareTruths');
      expect(decodeShareTruthsPayload(reply)).toEqual({
        truths: a.mind.listTruths(),
        trustWeight: 0.75,
      });
    });

    it('drops malformed lines and keeps the connection', async () => {
      const a = createAgent('agent-a');
      const [stream, remote] = createDuplexPair();
      a.service.attach(stream);

      remote.write('this is not json\n');
      remote.write(
        encodeEnvelope(
          createEnvelope('agent-b', 'shareTruths', { truths: 'nope', trust_weight: 0.5 })
        )
      );
      remote.write(
        encodeEnvelope(
          shareTruthsEnvelope('agent-b', [createTruth({ id: 'remote-1', confidence: 0.3 })], 0.5)
        )
      );

      await vi.waitFor(() => {
        expect(a.mind.listTruths().map((t) => t.id)).toEqual(['remote-1']);
      });
      expect(a.logger.messages('warn')).toEqual([
        'Dropped malformed envelope',
        'Dropped malformed payload',
      ]);
      expect(a.service.connectionCount()).toBe(1);
    });

    it('drops an oversized line and keeps the connection', async () => {
      const a = createAgent('agent-a', { maxLineBytes: 1024 });
      const [stream, remote] = createDuplexPair();
      a.service.attach(stream, { label: 'noisy' });
      const seen = new Date('2024-06-06T06:06:06.000Z');

      remote.write('x'.repeat(4096));
      remote.write(`\n${encodeEnvelope(createEnvelope('agent-b', 'peerPing', null, seen))}`);

      await vi.waitFor(() => {
        expect(a.service.getKnownPeers()).toEqual([{ agentId: 'agent-b', lastSeen: seen }]);
      });
      expect(a.logger.messages('warn')).toEqual(['Dropped oversized line']);
      expect(a.logger.warn).toHaveBeenCalledWith(
        { peer: 'noisy', error: 'Line exceeds 1024 bytes' },
        'Dropped oversized line'
      );
      expect(a.service.connectionCount()).toBe(1);
    });

    it('holds the envelope queue while a peer is not reading', async () => {
      const a = createAgent('agent-a');
      await learnGreeting(a.mind);
      const stream = new StalledStream();
      a.service.attach(stream);

      stream.push(encodeEnvelope(requestSyncEnvelope('agent-b')));
      await vi.waitFor(() => {
        expect(a.logger.messages('debug')).toContain('Envelope received');
      });

      let drained = false;
      const draining = a.service.drain().then(() => {
        drained = true;
      });
      await new Promise((resolve) => setTimeout(resolve, 20));

      expect(drained).toBe(false);
      expect(stream.written.map((line) => decodeEnvelope(line).type)).toEqual(['introduce']);

      await vi.waitFor(() => {
        stream.release();
        expect(drained).toBe(true);
      });
      await draining;
      expect(stream.written.map((line) => decodeEnvelope(line).type)).toEqual([
        'introduce',
        'shareTruths',
      ]);
    });

    it('broadcasts to every connection', async () => {
      const a = createAgent('agent-a');
      const [s1, r1] = createDuplexPair();
      const [s2, r2] = createDuplexPair();
      const lines1 = collectLines(r1);
      const lines2 = collectLines(r2);
      a.service.attach(s1);
      a.service.attach(s2);

      a.service.broadcastPing();
      a.service.broadcastRequestSync();
      a.service.broadcastIntroduce();

      await vi.waitFor(() => {
        expect(lines1.map((l) => decodeEnvelope(l).type)).toEqual([
          'introduce',
          'peerPing',
          'requestSync',
          'introduce',
        ]);
        expect(lines2).toHaveLength(4);
      });
    });

    it('records when a peer was last seen', async () => {
      const a = createAgent('agent-a');
      const [stream, remote] = createDuplexPair();
      a.service.attach(stream);
      const seen = new Date('2024-05-05T05:05:05.000Z');

      remote.write(encodeEnvelope(createEnvelope('agent-b', 'peerPing', null, seen)));

      await vi.waitFor(() => {
        expect(a.service.getKnownPeers()).toEqual([{ agentId: 'agent-b', lastSeen: seen }]);
      });
    });

    it('forgets connections that close', async () => {
      const a = createAgent('agent-a');
      const [stream] = createDuplexPair();
      a.service.attach(stream);
      expect(a.service.connectionCount()).toBe(1);

      stream.destroy();

      await vi.waitFor(() => {
        expect(a.service.connectionCount()).toBe(0);
      });
    });
  });

  describe('over TCP loopback', () => {
    it('syncs truths from a dialled peer', async () => {
      const a = createAgent('agent-a');
      const b = createAgent('agent-b');
      await learnGreeting(a.mind);
      await a.service.start();
      const port = a.service.address()?.port ?? 0;

      await b.service.connect('127.0.0.1', port);

      await vi.waitFor(() => {
        expect(b.mind.listTruths()).toHaveLength(1);
      });
      expect(b.service.getConnections()[0]?.outbound).toBe(true);
    });

    it('fails to bind a port that is taken', async () => {
      const a = createAgent('agent-a');
      await a.service.start();
      const port = a.service.address()?.port ?? 0;
      const b = createAgent('agent-b', { port });

      await expect(b.service.start()).rejects.toBeInstanceOf(NetworkBindError);
      expect(b.service.address()).toBeNull();
    });

    it('gives up dialling after bounded retries', async () => {
      const a = createAgent('agent-a', { reconnect: { maxAttempts: 2, baseDelayMs: 1 } });
      const port = await freePort();

      await expect(a.service.connect('127.0.0.1', port)).rejects.toBeInstanceOf(
        RetryExhaustedError
      );
      expect(a.logger.messages('warn')).toEqual(['Connect failed, retrying']);
    });

    it('abandons a pending redial when stopped', async () => {
      const port = await freePort();
      const b = createAgent('agent-b', { reconnect: { maxAttempts: 3, baseDelayMs: 500 } });
      const outcome = b.service.connect('127.0.0.1', port).then(
        () => null,
        (error: unknown) => error
      );

      await vi.waitFor(() => {
        expect(b.logger.messages('warn')).toEqual(['Connect failed, retrying']);
      });
      const a = createAgent('agent-a', { port });
      await a.service.start();
      await b.service.stop();

      const error = await outcome;
      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error).toMatchObject({ attempts: 2, lastError: expect.any(ServiceStoppedError) });
      expect(b.service.connectionCount()).toBe(0);

      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(a.service.connectionCount()).toBe(0);
    });

    it('refuses to dial once stopped', async () => {
      const a = createAgent('agent-a');
      await a.service.start();
      const b = createAgent('agent-b');
      await b.service.stop();

      await expect(
        b.service.connect('127.0.0.1', a.service.address()?.port ?? 0)
      ).rejects.toMatchObject({ attempts: 1, lastError: expect.any(ServiceStoppedError) });

      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(a.service.connectionCount()).toBe(0);
      expect(b.service.connectionCount()).toBe(0);
    });

    it('re-dials a dropped outbound connection', async () => {
      const a = createAgent('agent-a');
      const b = createAgent('agent-b', { reconnect: { maxAttempts: 1, baseDelayMs: 1 } });
      await a.service.start();
      await b.service.connect('127.0.0.1', a.service.address()?.port ?? 0);
      await vi.waitFor(() => {
        expect(a.service.connectionCount()).toBe(1);
      });

      await a.service.stop();

      await vi.waitFor(() => {
        expect(b.logger.messages('warn')).toContain('Reconnect abandoned');
      });
      expect(b.service.connectionCount()).toBe(0);
    });
  });

  it('closes every connection on stop', async () => {
    const a = createAgent('agent-a');
    const [stream] = createDuplexPair();
    a.service.attach(stream);

    await a.service.stop();

    expect(a.service.connectionCount()).toBe(0);
    expect(stream.destroyed).toBe(true);
  });
});
