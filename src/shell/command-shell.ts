import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { round3, type Logger, type VolitionalAction } from '../types/index.js';
import { parsePeerAddress } from '../config/index.js';
import { errorMessage } from '../core/errors.js';
import { isInspectKind, type InspectResult, type Mind } from '../core/mind.js';
import type { PeerService } from '../network/index.js';

/**
 * Frames listed by `frames` before the rest is summarized.
 */
export const FRAME_LIST_LIMIT = 20;

export const HELP_TEXT = `Commands:
  help                 Show this text
  say <text>           Inject a phenomenon (like 'say Hello?')
  think                Force a cognitive cycle and show decisions
  summary              Print compact state summary
  truths               List derived truths
  frames               List stored phenomenological frames
  persist              Force persist state to disk
  inspect <type> <id>  Inspect a record by id (type: truth|frame|hypothesis|goal)
  peers                List known peers and when they were last seen
  connect <host:port>  Dial a peer
  quit / exit          Save & Exit
Any unrecognized input is ingested as a phenomenon.`;

export interface ShellResult {
  lines: string[];
  /** The user asked to leave */
  quit: boolean;
}

export interface CommandShellOptions {
  /** Called once after `quit`/`exit` or end of input */
  onQuit: () => Promise<void>;
  input?: Readable;
  output?: Writable;
}

export function formatAction(action: VolitionalAction, label = 'ACTION'): string {
  return `${label}: [${action.intent}] -> ${action.payload}  (Reason: ${action.justification})`;
}

function formatInspection(result: InspectResult): string[] {
  switch (result.kind) {
    case 'truth':
      return [
        `Truth: ${result.record.emergentPrinciple}`,
        `Confidence: ${String(round3(result.record.confidence))}`,
        `Supporting frames: ${String(result.record.supportingFrames.size)}`,
      ];
    case 'frame':
      return [
        `Frame raw: ${result.record.rawInput}`,
        `Interpretation: ${result.record.subjectiveInterpretation}`,
        `Salience: ${String(round3(result.record.salience))}`,
      ];
    case 'hypothesis':
      return [
        `Hypothesis: ${result.record.prediction}`,
        `Confidence: ${String(round3(result.record.confidence))}`,
        `Violated: ${result.record.isViolated ? 'yes' : 'no'}`,
      ];
    case 'goal':
      return [
        `Goal: ${result.record.description}`,
        `Priority: ${String(round3(result.record.priority))}`,
        `Status: ${result.record.status}`,
      ];
  }
}

/**
 * CommandShell - line-oriented text front end over the mind.
 *
 * `handleLine` does the work and returns what to print, so it can be
 * driven without a terminal. `start` binds it to readline.
 */
export class CommandShell {
  private readonly mind: Mind;
  private readonly peers: PeerService | null;
  private readonly logger: Logger;
  private readonly options: CommandShellOptions;
  private rl: Interface | null = null;
  private quitting = false;

  constructor(
    mind: Mind,
    peers: PeerService | null,
    logger: Logger,
    options: CommandShellOptions
  ) {
    this.mind = mind;
    this.peers = peers;
    this.logger = logger.child({ component: 'shell' });
    this.options = options;
  }

  async handleLine(line: string): Promise<ShellResult> {
    const trimmed = line.trim();
    if (!trimmed) return { lines: [], quit: false };

    const spaceAt = trimmed.indexOf(' ');
    const command = (spaceAt === -1 ? trimmed : trimmed.slice(0, spaceAt)).toLowerCase();
    const arg = spaceAt === -1 ? '' : trimmed.slice(spaceAt + 1).trim();

    switch (command) {
      case 'quit':
      case 'exit':
        return { lines: ['Exiting, persisting state...'], quit: true };

      case 'help':
        return done(HELP_TEXT.split('\n'));

      case 'say':
        if (!arg) return done(['Usage: say <text>']);
        await this.mind.ingest(arg);
        return done([]);

      case 'think': {
        const actions = await this.mind.runCycle();
        if (actions.length === 0) return done(['No actions decided this cycle.']);
        return done(actions.map((action) => formatAction(action)));
      }

      case 'summary':
        return done(this.mind.summary().split('\n'));

      case 'truths': {
        const truths = this.mind.listTruths();
        if (truths.length === 0) return done(['No derived truths yet.']);
        return done(
          truths.map(
            (t) =>
              `- [${t.id}]: ${t.emergentPrinciple} (confidence: ${String(round3(t.confidence))})`
          )
        );
      }

      case 'frames': {
        const frames = this.mind.listFrames();
        if (frames.length === 0) return done(['No frames yet.']);
        const lines = frames
          .slice(0, FRAME_LIST_LIMIT)
          .map((f) => `- [${f.id}]: ${f.rawInput} (salience: ${String(round3(f.salience))})`);
        if (frames.length > FRAME_LIST_LIMIT) {
          lines.push(`... ${String(frames.length - FRAME_LIST_LIMIT)} more frames.`);
        }
        return done(lines);
      }

      case 'persist': {
        const saved = await this.mind.persist();
        return done([saved ? 'Persist requested.' : 'Persist failed; previous snapshot kept.']);
      }

      case 'inspect':
        return done(this.inspect(arg));

      case 'peers':
        return done(this.listPeers());

      case 'connect':
        return done(await this.connect(arg));

      default:
        // Anything else is a phenomenon
        await this.mind.ingest(trimmed);
        return done([]);
    }
  }

  private inspect(arg: string): string[] {
    const usage = 'Usage: inspect <truth|frame|hypothesis|goal> <id>';
    const [kind, id] = arg.split(/\s+/, 2);
    if (!kind || !id) return [usage];
    if (!isInspectKind(kind)) return [usage];

    const result = this.mind.inspect(kind, id);
    return result ? formatInspection(result) : ['Not found.'];
  }

  private listPeers(): string[] {
    if (!this.peers) return ['Networking disabled.'];

    const known = this.peers.getKnownPeers();
    if (known.length === 0) return ['No known peers.'];
    return known.map((peer) => `- ${peer.agentId} (last seen: ${peer.lastSeen.toISOString()})`);
  }

  private async connect(arg: string): Promise<string[]> {
    if (!this.peers) return ['Networking disabled.'];

    const address = parsePeerAddress(arg);
    if (!address) return ['Usage: connect <host:port>'];

    const target = `${address.host}:${String(address.port)}`;
    try {
      await this.peers.connect(address.host, address.port);
      return [`Connected to ${target}.`];
    } catch (error) {
      return [`Connect to ${target} failed: ${errorMessage(error)}`];
    }
  }

  // ==========================================================================
  // Terminal binding
  // ==========================================================================

  start(banner: string[] = []): void {
    const output = this.options.output ?? process.stdout;
    const rl = createInterface({
      input: this.options.input ?? process.stdin,
      output,
      prompt: '> ',
    });
    this.rl = rl;

    for (const line of banner) this.print(line);
    rl.prompt();

    let pending = Promise.resolve();
    rl.on('line', (line) => {
      pending = pending.then(() => this.runLine(line));
    });
    rl.on('close', () => {
      this.rl = null;
      pending = pending.then(() => this.quit());
    });
  }

  /**
   * Print auto-decided actions from the background loop.
   */
  announce(actions: VolitionalAction[]): void {
    for (const action of actions) {
      this.print(formatAction(action, 'AUTO-ACTION'));
    }
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private async runLine(line: string): Promise<void> {
    if (this.quitting) return;

    let result: ShellResult;
    try {
      result = await this.handleLine(line);
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Command failed');
      result = { lines: [`Error: ${errorMessage(error)}`], quit: false };
    }

    for (const out of result.lines) this.print(out);

    if (result.quit) {
      await this.quit();
    } else {
      this.rl?.prompt();
    }
  }

  private async quit(): Promise<void> {
    if (this.quitting) return;
    this.quitting = true;
    try {
      await this.options.onQuit();
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Shutdown failed');
    }
  }

  private print(line: string): void {
    (this.options.output ?? process.stdout).write(`${line}\n`);
  }
}

function done(lines: string[]): ShellResult {
  return { lines, quit: false };
}

export function createCommandShell(
  mind: Mind,
  peers: PeerService | null,
  logger: Logger,
  options: CommandShellOptions
): CommandShell {
  return new CommandShell(mind, peers, logger, options);
}
