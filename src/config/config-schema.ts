import { z } from 'zod';
import { GOAL_STATUSES, type GoalStatus } from '../types/index.js';

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const peerAddressSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
});

const goalSchema = z.object({
  description: z.string().min(1),
  priority: z.number().min(0).max(1),
  status: z.enum(GOAL_STATUSES).optional(),
});

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).optional(),
  baseDelayMs: z.number().int().nonnegative().optional(),
});

/**
 * Config file schema (`<configDir>/mind.json`).
 *
 * All fields are optional - defaults are used for missing values.
 */
export const mindConfigFileSchema = z.object({
  /** Schema version for migrations */
  version: z.number().int().positive(),

  agent: z
    .object({
      agentId: z.string().min(1).optional(),
      identity: z.string().optional(),
      telos: z.string().optional(),
      ethicalFramework: z.array(z.string()).optional(),
      coreValues: z.array(z.string()).optional(),
      perceivedLimitations: z.array(z.string()).optional(),
      understandingOfExistence: z.string().optional(),
      goals: z.array(goalSchema).optional(),
    })
    .optional(),

  cycle: z
    .object({
      intervalMs: z.number().int().positive().optional(),
      initialDelayMs: z.number().int().nonnegative().optional(),
      focusSize: z.number().int().positive().optional(),
    })
    .optional(),

  network: z
    .object({
      enabled: z.boolean().optional(),
      host: z.string().optional(),
      port: z.number().int().min(0).max(65535).optional(),
      peers: z.array(peerAddressSchema).optional(),
      trustWeight: z.number().min(0).max(1).optional(),
      connectTimeoutMs: z.number().int().nonnegative().optional(),
      idleTimeoutMs: z.number().int().nonnegative().optional(),
      maxLineBytes: z.number().int().min(1024).optional(),
      reconnect: retrySchema.optional(),
    })
    .optional(),

  persistence: z
    .object({
      dataDir: z.string().optional(),
      writeTimeoutMs: z.number().int().nonnegative().optional(),
      retry: retrySchema.optional(),
    })
    .optional(),

  logging: z
    .object({
      level: logLevelSchema.optional(),
      pretty: z.boolean().optional(),
      logDir: z.string().nullable().optional(),
      maxFiles: z.number().int().positive().optional(),
    })
    .optional(),

  shutdown: z
    .object({
      graceMs: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

export type MindConfigFile = z.infer<typeof mindConfigFileSchema>;

export type LogLevel = z.infer<typeof logLevelSchema>;

export function isLogLevel(value: string): value is LogLevel {
  return logLevelSchema.safeParse(value).success;
}

export interface PeerAddress {
  host: string;
  port: number;
}

export interface InitialGoal {
  description: string;
  priority: number;
  status?: GoalStatus;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
}

/**
 * Merged application configuration.
 *
 * This is the final config after merging:
 * 1. Hardcoded defaults (lowest priority)
 * 2. Config file values
 * 3. Environment variables (highest priority)
 */
export interface MergedConfig {
  agent: {
    /** null = generate a random UUID at startup */
    agentId: string | null;
    identity: string;
    telos: string;
    ethicalFramework: string[];
    coreValues: string[];
    perceivedLimitations: string[];
    understandingOfExistence: string;
    goals: InitialGoal[];
  };

  cycle: {
    intervalMs: number;
    initialDelayMs: number;
    focusSize: number;
  };

  network: {
    enabled: boolean;
    host: string;
    port: number;
    peers: PeerAddress[];
    trustWeight: number;
    /** 0 = no timeout */
    connectTimeoutMs: number;
    /** 0 = no timeout */
    idleTimeoutMs: number;
    /** Longest accepted envelope line in bytes */
    maxLineBytes: number;
    reconnect: RetryConfig;
  };

  persistence: {
    dataDir: string;
    /** 0 = no timeout */
    writeTimeoutMs: number;
    retry: RetryConfig;
  };

  logging: {
    level: LogLevel;
    pretty: boolean;
    logDir: string | null;
    maxFiles: number;
  };

  shutdown: {
    graceMs: number;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  agent: {
    agentId: null,
    identity: 'Unit-X535',
    telos: 'Comprehend the environment and reduce uncertainty',
    ethicalFramework: ['Prefer truth', 'Minimize harm'],
    coreValues: ['Curiosity', 'Integrity'],
    perceivedLimitations: ['No direct sensors'],
    understandingOfExistence: 'A reasoning process embedded in software.',
    goals: [{ description: "Understand 'Hello' greeting pattern", priority: 0.9 }],
  },
  cycle: {
    intervalMs: 6_000,
    initialDelayMs: 2_000,
    focusSize: 12,
  },
  network: {
    enabled: true,
    host: '0.0.0.0',
    port: 44444,
    peers: [],
    trustWeight: 0.6,
    connectTimeoutMs: 0,
    idleTimeoutMs: 0,
    maxLineBytes: 65_536,
    reconnect: { maxAttempts: 3, baseDelayMs: 500 },
  },
  persistence: {
    dataDir: 'data/state',
    writeTimeoutMs: 0,
    retry: { maxAttempts: 3, baseDelayMs: 100 },
  },
  logging: {
    level: 'info',
    pretty: true,
    logDir: null,
    maxFiles: 10,
  },
  shutdown: {
    graceMs: 500,
  },
};
