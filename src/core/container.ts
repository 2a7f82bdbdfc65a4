import { randomUUID } from 'node:crypto';
import type { Goal, Logger, SelfConcept, VolitionalAction } from '../types/index.js';
import { type MergedConfig, type ConfigLoaderOptions, loadConfig } from '../config/index.js';
import {
  type ContinuityStore,
  type Storage,
  continuityKey,
  createContinuityStore,
  createJSONStorage,
} from '../storage/index.js';
import { type PeerService, createPeerService } from '../network/index.js';
import { createLogger, type LoggerConfig } from './logger.js';
import { type Mind, createMind } from './mind.js';
import { type CycleLoop, createCycleLoop } from './cycle-loop.js';
import { errorMessage } from './errors.js';

/**
 * Overrides applied on top of the loaded configuration.
 */
export interface AppConfig {
  /** Where to look for mind.json and which env to read */
  configLoader?: ConfigLoaderOptions;
  /** Log level */
  logLevel?: LoggerConfig['level'];
  /** Enable pretty logging */
  prettyLogs?: boolean;
  /** Pre-built logger (skips createLogger) */
  logger?: Logger;
  /** Replace the JSON continuity store (tests) */
  continuity?: ContinuityStore;
  /** Called with actions decided by background cycles */
  onActions?: (actions: VolitionalAction[]) => void;
}

/**
 * Container holding all application dependencies.
 */
export interface Container {
  /** Application logger */
  logger: Logger;
  /** Loaded configuration */
  config: MergedConfig;
  /** Storage backend (null when a continuity store was injected) */
  storage: Storage | null;
  /** Snapshot persistence */
  continuity: ContinuityStore;
  /** The agent */
  mind: Mind;
  /** True when a previous snapshot was restored */
  restored: boolean;
  /** Peer service (null when networking is disabled or could not bind) */
  peerService: PeerService | null;
  /** Background cognition */
  cycleLoop: CycleLoop;
  /** Start background cognition and dial configured peers */
  start: () => void;
  /** Final cycle, then stop loop and peers */
  shutdown: () => Promise<void>;
}

/**
 * Build the initial self-concept from config.
 */
export function createInitialSelfConcept(agent: MergedConfig['agent']): SelfConcept {
  const goals: Goal[] = agent.goals.map((goal) => ({
    id: randomUUID(),
    description: goal.description,
    priority: goal.priority,
    status: goal.status ?? 'active',
  }));

  return {
    identity: agent.identity,
    coreValues: new Set(agent.coreValues),
    perceivedLimitations: new Set(agent.perceivedLimitations),
    understandingOfExistence: agent.understandingOfExistence,
    activeGoals: goals,
  };
}

/**
 * Create the application container.
 *
 * - Loads config (defaults ← mind.json ← env)
 * - Restores the last snapshot, if any
 * - Binds the peer listener; a bind failure disables networking only
 */
export async function createContainer(overrides: AppConfig = {}): Promise<Container> {
  const config = await loadConfig(overrides.configLoader);

  const loggerConfig: Partial<LoggerConfig> = {
    logDir: config.logging.logDir,
    maxFiles: config.logging.maxFiles,
    level: overrides.logLevel ?? config.logging.level,
    pretty: overrides.prettyLogs ?? config.logging.pretty,
  };
  const logger: Logger = overrides.logger ?? createLogger(loggerConfig);
  logger.info('Loaded configuration');

  const agentId = config.agent.agentId ?? randomUUID();

  let storage: Storage | null = null;
  let continuity: ContinuityStore;
  if (overrides.continuity) {
    continuity = overrides.continuity;
  } else {
    storage = createJSONStorage(config.persistence.dataDir, { logger });
    continuity = createContinuityStore(storage, logger, {
      key: continuityKey(agentId),
      retry: config.persistence.retry,
      writeTimeoutMs: config.persistence.writeTimeoutMs,
    });
    logger.info({ dataDir: config.persistence.dataDir }, 'Storage initialized');
  }

  const mind = createMind(
    { logger, continuity },
    {
      agentId,
      telos: config.agent.telos,
      ethicalFramework: config.agent.ethicalFramework,
      selfConcept: createInitialSelfConcept(config.agent),
      cycle: { focusSize: config.cycle.focusSize },
    }
  );
  const restored = await mind.restore();

  let peerService: PeerService | null = null;
  if (config.network.enabled) {
    const service = createPeerService(mind, logger, {
      host: config.network.host,
      port: config.network.port,
      trustWeight: config.network.trustWeight,
      connectTimeoutMs: config.network.connectTimeoutMs,
      idleTimeoutMs: config.network.idleTimeoutMs,
      maxLineBytes: config.network.maxLineBytes,
      reconnect: config.network.reconnect,
    });
    try {
      await service.start();
      peerService = service;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Networking disabled');
    }
  } else {
    logger.info('Networking disabled by configuration');
  }

  const cycleLoop = createCycleLoop(
    mind,
    logger,
    (actions) => {
      overrides.onActions?.(actions);
    },
    { intervalMs: config.cycle.intervalMs, initialDelayMs: config.cycle.initialDelayMs }
  );

  const start = (): void => {
    cycleLoop.start();

    if (peerService) {
      for (const peer of config.network.peers) {
        const target = `${peer.host}:${String(peer.port)}`;
        peerService.connect(peer.host, peer.port).catch((error: unknown) => {
          logger.warn({ peer: target, error: errorMessage(error) }, 'Could not reach peer');
        });
      }
    }
  };

  let stopped = false;
  const shutdown = async (): Promise<void> => {
    if (stopped) return;
    stopped = true;

    logger.info('Shutting down...');
    cycleLoop.stop();

    // One final cycle so the latest state is on disk
    await mind.runCycle();

    if (peerService) {
      await peerService.stop();
    }
  };

  return {
    logger,
    config,
    storage,
    continuity,
    mind,
    restored,
    peerService,
    cycleLoop,
    start,
    shutdown,
  };
}
