import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  isLogLevel,
  mindConfigFileSchema,
  type MergedConfig,
  type MindConfigFile,
  type PeerAddress,
} from './config-schema.js';

/**
 * Environment variables consulted by the loader.
 */
export type ConfigEnv = Record<string, string | undefined>;

export interface ConfigLoaderOptions {
  /** Directory holding mind.json (default: data/config) */
  configPath?: string;
  /** Environment source (default: process.env) */
  env?: ConfigEnv;
  /** Called when something is off but not fatal */
  onWarning?: (message: string) => void;
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/mind.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: ConfigEnv;
  private readonly onWarning: (message: string) => void;
  private loadedConfig: MindConfigFile | null = null;

  constructor(options: ConfigLoaderOptions = {}) {
    this.configPath = options.configPath ?? 'data/config';
    this.env = options.env ?? process.env;
    this.onWarning =
      options.onWarning ??
      ((message) => {
        // eslint-disable-next-line no-console
        console.warn(message);
      });
  }

  /**
   * Load and merge configuration from all sources.
   *
   * @throws Error if the config file exists but is invalid
   */
  async load(): Promise<MergedConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const config = structuredClone(DEFAULT_CONFIG);

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): MindConfigFile | null {
    return this.loadedConfig;
  }

  private async loadConfigFile(): Promise<MindConfigFile | null> {
    const filePath = join(this.configPath, 'mind.json');

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // File doesn't exist - that's OK, use defaults
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load config file: ${message}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse config file ${filePath}: ${message}`);
    }

    const parsed = mindConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue ? issue.path.join('.') : '(root)';
      throw new Error(
        `Invalid config file ${filePath} at '${field}': ${issue?.message ?? 'unknown error'}`
      );
    }

    if (parsed.data.version > CONFIG_FILE_VERSION) {
      this.onWarning(
        `Config file version (${String(parsed.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return parsed.data;
  }

  private mergeConfigFile(config: MergedConfig, file: MindConfigFile): void {
    if (file.agent) {
      const { goals, ...rest } = file.agent;
      config.agent = { ...config.agent, ...rest };
      if (goals) {
        config.agent.goals = goals.map((goal) => ({ ...goal }));
      }
    }

    if (file.cycle) {
      config.cycle = { ...config.cycle, ...file.cycle };
    }

    if (file.network) {
      const { reconnect, peers, ...rest } = file.network;
      config.network = { ...config.network, ...rest };
      if (peers) {
        config.network.peers = peers.map((peer) => ({ ...peer }));
      }
      if (reconnect) {
        config.network.reconnect = { ...config.network.reconnect, ...reconnect };
      }
    }

    if (file.persistence) {
      const { retry, ...rest } = file.persistence;
      config.persistence = { ...config.persistence, ...rest };
      if (retry) {
        config.persistence.retry = { ...config.persistence.retry, ...retry };
      }
    }

    if (file.logging) {
      config.logging = { ...config.logging, ...file.logging };
    }

    if (file.shutdown) {
      config.shutdown = { ...config.shutdown, ...file.shutdown };
    }
  }

  private mergeEnvironment(config: MergedConfig): void {
    const agentId = this.env['MIND_AGENT_ID'];
    if (agentId) {
      config.agent.agentId = agentId;
    }

    const dataDir = this.env['MIND_DATA_DIR'];
    if (dataDir) {
      config.persistence.dataDir = dataDir;
    }

    const host = this.env['MIND_HOST'];
    if (host) {
      config.network.host = host;
    }

    const port = this.readInt('MIND_PORT');
    if (port !== undefined) {
      config.network.port = port;
    }

    const peers = this.env['MIND_PEERS'];
    if (peers) {
      config.network.peers = parsePeerList(peers, this.onWarning);
    }

    const networkEnabled = this.env['MIND_NETWORK_ENABLED'];
    if (networkEnabled) {
      config.network.enabled = !['0', 'false', 'no', 'off'].includes(
        networkEnabled.trim().toLowerCase()
      );
    }

    const intervalMs = this.readInt('MIND_CYCLE_INTERVAL_MS');
    if (intervalMs !== undefined && intervalMs > 0) {
      config.cycle.intervalMs = intervalMs;
    }

    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel && isLogLevel(logLevel)) {
      config.logging.level = logLevel;
    }
  }

  private readInt(name: string): number | undefined {
    const raw = this.env[name];
    if (!raw) return undefined;

    const value = Number.parseInt(raw, 10);
    if (Number.isNaN(value)) {
      this.onWarning(`Ignoring ${name}: '${raw}' is not an integer`);
      return undefined;
    }
    return value;
  }
}

/**
 * Parse `host:port,host:port`. Malformed entries are skipped.
 */
export function parsePeerList(
  value: string,
  onWarning: (message: string) => void = () => undefined
): PeerAddress[] {
  const peers: PeerAddress[] = [];

  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const address = parsePeerAddress(trimmed);
    if (address) {
      peers.push(address);
    } else {
      onWarning(`Ignoring malformed peer address '${trimmed}'`);
    }
  }

  return peers;
}

/**
 * Parse one `host:port`. Returns null when malformed.
 */
export function parsePeerAddress(value: string): PeerAddress | null {
  const separator = value.lastIndexOf(':');
  if (separator <= 0) return null;

  const host = value.slice(0, separator);
  const portText = value.slice(separator + 1);
  if (!/^\d+$/.test(portText)) return null;

  const port = Number(portText);
  if (port < 1 || port > 65535) return null;

  return { host, port };
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(options?: ConfigLoaderOptions): ConfigLoader {
  return new ConfigLoader(options);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(options?: ConfigLoaderOptions): Promise<MergedConfig> {
  const loader = createConfigLoader(options);
  return loader.load();
}
