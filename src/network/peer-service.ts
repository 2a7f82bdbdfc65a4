import { randomUUID } from 'node:crypto';
import { createConnection, createServer, Socket, type AddressInfo, type Server } from 'node:net';
import type { Duplex } from 'node:stream';
import type { AbstractTruth, Logger } from '../types/index.js';
import type { MergeResult } from '../core/belief-store.js';
import {
  DecodeError,
  NetworkBindError,
  ServiceStoppedError,
  TimeoutError,
  errorMessage,
} from '../core/errors.js';
import type { Introduction } from '../core/mind.js';
import { withRetry } from '../core/retry.js';
import { createTraceContext, withTraceContext } from '../core/trace-context.js';
import {
  LineSplitter,
  createEnvelope,
  decodeEnvelope,
  decodeIntroducePayload,
  decodeRequestSyncPayload,
  decodeShareTruthsPayload,
  encodeEnvelope,
  introduceEnvelope,
  requestSyncEnvelope,
  shareTruthsEnvelope,
  type NetworkEnvelope,
} from './envelope.js';

/**
 * The part of the mind the peer service talks to.
 */
export interface PeerMind {
  readonly id: string;
  introduction(): Introduction;
  listTruths(): AbstractTruth[];
  mergeRemoteTruths(truths: readonly AbstractTruth[], trustWeight: number): Promise<MergeResult>;
}

export interface PeerAddress {
  host: string;
  port: number;
}

export interface PeerServiceConfig {
  /** Listen address (default: 0.0.0.0) */
  host: string;
  /** Listen port, 0 = ephemeral (default: 44444) */
  port: number;
  /** Weight peers should apply to the truths we share (default: 0.6) */
  trustWeight: number;
  /** Outbound connect timeout per attempt in ms, 0 = none */
  connectTimeoutMs: number;
  /** Close a socket after this long without traffic in ms, 0 = never */
  idleTimeoutMs: number;
  /** Bounded retry for outbound connects and reconnects */
  reconnect: { maxAttempts: number; baseDelayMs: number };
  /** Longest accepted envelope line; longer input is discarded */
  maxLineBytes: number;
}

const DEFAULT_CONFIG: PeerServiceConfig = {
  host: '0.0.0.0',
  port: 44444,
  trustWeight: 0.6,
  connectTimeoutMs: 0,
  idleTimeoutMs: 0,
  reconnect: { maxAttempts: 3, baseDelayMs: 500 },
  maxLineBytes: 65_536,
};

/**
 * A known remote agent.
 */
export interface KnownPeer {
  agentId: string;
  lastSeen: Date;
}

interface PeerConnection {
  id: string;
  label: string;
  stream: Duplex;
  splitter: LineSplitter;
  /** Set for connections we dialled; used to re-dial on drop */
  outbound: PeerAddress | null;
  /** Agent id learned from the peer's envelopes */
  agentId: string | null;
  /** Serializes envelope handling so merges apply in arrival order */
  queue: Promise<void>;
}

export interface ConnectionInfo {
  id: string;
  label: string;
  agentId: string | null;
  outbound: boolean;
}

/**
 * PeerService - gossip of derived truths between agents.
 *
 * Each connection is Connected → (receive loop) → Closed. Envelopes are
 * newline-delimited; a line that fails to decode is dropped and the
 * connection stays open.
 */
export class PeerService {
  private readonly mind: PeerMind;
  private readonly logger: Logger;
  private readonly config: PeerServiceConfig;
  private readonly connections = new Map<string, PeerConnection>();
  private readonly knownPeers = new Map<string, Date>();
  private server: Server | null = null;
  private stopping = false;

  constructor(mind: PeerMind, logger: Logger, config: Partial<PeerServiceConfig> = {}) {
    this.mind = mind;
    this.logger = logger.child({ component: 'peer-service' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Start listening.
   *
   * @throws NetworkBindError if the port cannot be bound
   */
  start(): Promise<void> {
    this.stopping = false;

    return new Promise((resolve, reject) => {
      const server = createServer((socket) => {
        this.attach(socket, { label: socketLabel(socket) });
      });

      const onListenError = (error: Error): void => {
        reject(new NetworkBindError(this.config.port, { cause: error }));
      };

      server.once('error', onListenError);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', onListenError);
        server.on('error', (error) => {
          this.logger.error({ error: error.message }, 'Listener error');
        });
        this.server = server;
        this.logger.info({ address: this.address() }, 'Listening for peers');
        resolve();
      });
    });
  }

  /**
   * Close the listener and every open connection.
   */
  async stop(): Promise<void> {
    this.stopping = true;

    for (const connection of this.connections.values()) {
      connection.stream.destroy();
    }
    this.connections.clear();

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => {
          resolve();
        });
      });
    }

    this.logger.info('Peer service stopped');
  }

  /**
   * Bound address, or null when not listening.
   */
  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  // ==========================================================================
  // Connections
  // ==========================================================================

  /**
   * Take over a connected stream: start its receive loop and introduce
   * ourselves. Returns the connection id.
   */
  attach(stream: Duplex, options: { label?: string; outbound?: PeerAddress } = {}): string {
    const label = options.label ?? 'stream';
    const connection: PeerConnection = {
      id: randomUUID(),
      label,
      stream,
      splitter: new LineSplitter({
        maxLineBytes: this.config.maxLineBytes,
        onOverflow: (error) => {
          this.logger.warn({ peer: label, error: error.message }, 'Dropped oversized line');
        },
      }),
      outbound: options.outbound ?? null,
      agentId: null,
      queue: Promise.resolve(),
    };
    this.connections.set(connection.id, connection);

    if (this.config.idleTimeoutMs > 0 && stream instanceof Socket) {
      stream.setTimeout(this.config.idleTimeoutMs, () => {
        this.logger.info({ peer: connection.label }, 'Peer idle, closing');
        stream.destroy();
      });
    }

    stream.on('data', (chunk: Buffer | string) => {
      for (const line of connection.splitter.push(chunk)) {
        connection.queue = connection.queue.then(() => this.handleLine(connection, line));
      }
    });

    stream.on('error', (error) => {
      this.logger.warn({ peer: connection.label, error: error.message }, 'Peer connection error');
    });

    stream.on('close', () => {
      this.detach(connection);
    });

    this.logger.info(
      { peer: connection.label, outbound: connection.outbound !== null },
      'Peer connected'
    );
    void this.send(connection, introduceEnvelope(this.mind.id, this.mind.introduction()));

    return connection.id;
  }

  /**
   * Dial a peer with bounded retry.
   *
   * A dialled connection that later drops is re-dialled the same way
   * unless the service is stopping.
   */
  async connect(host: string, port: number): Promise<string> {
    const address: PeerAddress = { host, port };
    const { maxAttempts, baseDelayMs } = this.config.reconnect;

    const socket = await withRetry(() => this.dial(address), {
      maxAttempts,
      baseDelayMs,
      shouldRetry: () => !this.stopping,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.warn(
          { peer: `${host}:${String(port)}`, attempt, delayMs, error: errorMessage(error) },
          'Connect failed, retrying'
        );
      },
    });

    // stop() may have run while the dial was in flight
    if (this.stopping) {
      socket.destroy();
      throw new ServiceStoppedError('Peer service');
    }

    return this.attach(socket, { label: `${host}:${String(port)}`, outbound: address });
  }

  private dial(address: PeerAddress): Promise<Socket> {
    if (this.stopping) {
      return Promise.reject(new ServiceStoppedError('Peer service'));
    }

    return new Promise((resolve, reject) => {
      const socket = createConnection({ host: address.host, port: address.port });
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onError = (error: Error): void => {
        clearTimeout(timer);
        socket.destroy();
        reject(error);
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onError);
        resolve(socket);
      });

      if (this.config.connectTimeoutMs > 0) {
        timer = setTimeout(() => {
          socket.off('error', onError);
          socket.destroy();
          reject(new TimeoutError(this.config.connectTimeoutMs));
        }, this.config.connectTimeoutMs);
      }
    });
  }

  private detach(connection: PeerConnection): void {
    if (!this.connections.delete(connection.id)) return;

    this.logger.info({ peer: connection.label, agentId: connection.agentId }, 'Peer disconnected');

    if (connection.outbound && !this.stopping) {
      const { host, port } = connection.outbound;
      this.connect(host, port).catch((error: unknown) => {
        this.logger.warn(
          { peer: connection.label, error: errorMessage(error) },
          'Reconnect abandoned'
        );
      });
    }
  }

  // ==========================================================================
  // Sending
  // ==========================================================================

  broadcastIntroduce(): void {
    this.broadcast(introduceEnvelope(this.mind.id, this.mind.introduction()));
  }

  /**
   * Ask every peer for its truths. Peers currently reply with the full set.
   */
  broadcastRequestSync(since?: Date): void {
    this.broadcast(requestSyncEnvelope(this.mind.id, since));
  }

  broadcastPing(): void {
    this.broadcast(createEnvelope(this.mind.id, 'peerPing'));
  }

  private broadcast(envelope: NetworkEnvelope): void {
    for (const connection of this.connections.values()) {
      void this.send(connection, envelope);
    }
  }

  /**
   * Write one envelope. Resolves once the stream accepts more data:
   * immediately, or on 'drain' or 'close' when its buffer is full.
   */
  private async send(connection: PeerConnection, envelope: NetworkEnvelope): Promise<void> {
    const { stream } = connection;
    if (stream.destroyed || !stream.writable) return;
    if (stream.write(encodeEnvelope(envelope))) return;

    await new Promise<void>((resolve) => {
      const done = (): void => {
        stream.off('drain', done);
        stream.off('close', done);
        resolve();
      };
      stream.on('drain', done);
      stream.on('close', done);
    });
  }

  private sendTruths(connection: PeerConnection): Promise<void> {
    return this.send(
      connection,
      shareTruthsEnvelope(this.mind.id, this.mind.listTruths(), this.config.trustWeight)
    );
  }

  // ==========================================================================
  // Receiving
  // ==========================================================================

  private async handleLine(connection: PeerConnection, line: string): Promise<void> {
    let envelope: NetworkEnvelope;
    try {
      envelope = decodeEnvelope(line);
    } catch (error) {
      this.logger.warn(
        { peer: connection.label, error: errorMessage(error) },
        'Dropped malformed envelope'
      );
      return;
    }

    await withTraceContext(createTraceContext(envelope.fromAgentId), async () => {
      try {
        await this.handleEnvelope(connection, envelope);
      } catch (error) {
        const context = { peer: connection.label, type: envelope.type, error: errorMessage(error) };
        if (error instanceof DecodeError) {
          this.logger.warn(context, 'Dropped malformed payload');
        } else {
          this.logger.error(context, 'Failed to handle envelope');
        }
      }
    });
  }

  private async handleEnvelope(
    connection: PeerConnection,
    envelope: NetworkEnvelope
  ): Promise<void> {
    connection.agentId = envelope.fromAgentId;
    this.knownPeers.set(envelope.fromAgentId, envelope.timestamp);
    this.logger.debug({ peer: connection.label, type: envelope.type }, 'Envelope received');

    switch (envelope.type) {
      case 'introduce': {
        const intro = decodeIntroducePayload(envelope);
        if (intro) {
          this.logger.info(
            { agentId: intro.id, identity: intro.identityLabel, telos: intro.telos },
            'Peer introduced'
          );
        }
        await this.sendTruths(connection);
        return;
      }

      case 'shareTruths': {
        const payload = decodeShareTruthsPayload(envelope);
        if (payload) {
          await this.mind.mergeRemoteTruths(payload.truths, payload.trustWeight);
        }
        return;
      }

      case 'requestSync': {
        const { since } = decodeRequestSyncPayload(envelope);
        this.logger.debug({ since: since?.toISOString() }, 'Sync requested, sending full set');
        await this.sendTruths(connection);
        return;
      }

      case 'acceptSync':
        this.logger.info({ agentId: envelope.fromAgentId }, 'Sync accepted');
        return;

      case 'peerPing':
        return;
    }
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  getKnownPeers(): KnownPeer[] {
    return Array.from(this.knownPeers, ([agentId, lastSeen]) => ({
      agentId,
      lastSeen: new Date(lastSeen.getTime()),
    }));
  }

  getConnections(): ConnectionInfo[] {
    return Array.from(this.connections.values(), (connection) => ({
      id: connection.id,
      label: connection.label,
      agentId: connection.agentId,
      outbound: connection.outbound !== null,
    }));
  }

  connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Resolves once every envelope received so far has been handled.
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.connections.values(), (connection) => connection.queue));
  }
}

function socketLabel(socket: Socket): string {
  return `${socket.remoteAddress ?? 'unknown'}:${String(socket.remotePort ?? 0)}`;
}

export function createPeerService(
  mind: PeerMind,
  logger: Logger,
  config?: Partial<PeerServiceConfig>
): PeerService {
  return new PeerService(mind, logger, config);
}
