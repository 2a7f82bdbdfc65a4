/**
 * Peer wire format.
 *
 * One envelope per line of UTF-8 JSON:
 *
 * ```json
 * {"from_agent_id":"a1","type":"introduce","payload":"eyJpZCI6...","timestamp":"2024-01-01T00:00:00.000Z"}
 * ```
 *
 * `payload` is the base64 of the payload's own JSON bytes, or null.
 * Its shape depends on `type`.
 */

import { StringDecoder } from 'node:string_decoder';
import { z } from 'zod';
import { clamp, type AbstractTruth } from '../types/index.js';
import { DecodeError } from '../core/errors.js';
import type { Introduction } from '../core/mind.js';
import { decodeTruth, encodeTruth, isoTimestamp, truthRecordSchema } from '../storage/records.js';

export const MESSAGE_TYPES = [
  'introduce',
  'shareTruths',
  'requestSync',
  'acceptSync',
  'peerPing',
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export interface NetworkEnvelope {
  fromAgentId: string;
  type: MessageType;
  /** Raw payload JSON bytes */
  payload: Buffer | null;
  timestamp: Date;
}

export interface ShareTruthsPayload {
  truths: AbstractTruth[];
  trustWeight: number;
}

export interface RequestSyncPayload {
  since?: Date;
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export const envelopeRecordSchema = z.object({
  from_agent_id: z.string().min(1),
  type: z.enum(MESSAGE_TYPES),
  payload: z
    .string()
    .regex(BASE64, { message: 'Payload is not base64' })
    .nullable()
    .optional(),
  timestamp: isoTimestamp,
});

export const introducePayloadSchema = z.object({
  id: z.string(),
  identity_label: z.string(),
  telos: z.string(),
});

export const shareTruthsPayloadSchema = z.object({
  truths: z.array(truthRecordSchema),
  /** Any finite weight is accepted and clamped to [0, 1] */
  trust_weight: z.number().transform((value) => clamp(value)),
});

export const requestSyncPayloadSchema = z.object({
  since: isoTimestamp.nullable().optional(),
});

export type EnvelopeRecord = z.infer<typeof envelopeRecordSchema>;

// =============================================================================
// Envelope
// =============================================================================

/**
 * Serialize an envelope to one line, newline included.
 */
export function encodeEnvelope(envelope: NetworkEnvelope): string {
  const record: EnvelopeRecord = {
    from_agent_id: envelope.fromAgentId,
    type: envelope.type,
    payload: envelope.payload ? envelope.payload.toString('base64') : null,
    timestamp: envelope.timestamp.toISOString(),
  };
  return `${JSON.stringify(record)}\n`;
}

/**
 * Parse one line into an envelope.
 *
 * @throws DecodeError if the line is not a valid envelope
 */
export function decodeEnvelope(line: string): NetworkEnvelope {
  const record = parseWith(envelopeRecordSchema, parseJson(line, 'envelope'), 'envelope');

  return {
    fromAgentId: record.from_agent_id,
    type: record.type,
    payload: record.payload ? Buffer.from(record.payload, 'base64') : null,
    timestamp: new Date(record.timestamp),
  };
}

export function createEnvelope(
  fromAgentId: string,
  type: MessageType,
  payload: unknown = null,
  timestamp: Date = new Date()
): NetworkEnvelope {
  return {
    fromAgentId,
    type,
    payload: payload === null ? null : Buffer.from(JSON.stringify(payload), 'utf-8'),
    timestamp,
  };
}

// =============================================================================
// Payloads
// =============================================================================

export function introduceEnvelope(fromAgentId: string, intro: Introduction): NetworkEnvelope {
  return createEnvelope(fromAgentId, 'introduce', {
    id: intro.id,
    identity_label: intro.identityLabel,
    telos: intro.telos,
  } satisfies z.infer<typeof introducePayloadSchema>);
}

export function shareTruthsEnvelope(
  fromAgentId: string,
  truths: readonly AbstractTruth[],
  trustWeight: number
): NetworkEnvelope {
  return createEnvelope(fromAgentId, 'shareTruths', {
    truths: truths.map(encodeTruth),
    trust_weight: trustWeight,
  } satisfies z.infer<typeof shareTruthsPayloadSchema>);
}

export function requestSyncEnvelope(fromAgentId: string, since?: Date): NetworkEnvelope {
  return createEnvelope(fromAgentId, 'requestSync', {
    since: since ? since.toISOString() : null,
  } satisfies z.infer<typeof requestSyncPayloadSchema>);
}

/**
 * @returns null when the envelope carries no payload
 * @throws DecodeError on a malformed payload
 */
export function decodeIntroducePayload(envelope: NetworkEnvelope): Introduction | null {
  if (!envelope.payload) return null;
  const record = parseWith(introducePayloadSchema, parsePayload(envelope.payload), 'introduce');
  return { id: record.id, identityLabel: record.identity_label, telos: record.telos };
}

/**
 * @returns null when the envelope carries no payload
 * @throws DecodeError on a malformed payload
 */
export function decodeShareTruthsPayload(envelope: NetworkEnvelope): ShareTruthsPayload | null {
  if (!envelope.payload) return null;
  const record = parseWith(
    shareTruthsPayloadSchema,
    parsePayload(envelope.payload),
    'shareTruths'
  );
  return { truths: record.truths.map(decodeTruth), trustWeight: record.trust_weight };
}

/**
 * @throws DecodeError on a malformed payload
 */
export function decodeRequestSyncPayload(envelope: NetworkEnvelope): RequestSyncPayload {
  if (!envelope.payload) return {};
  const record = parseWith(
    requestSyncPayloadSchema,
    parsePayload(envelope.payload),
    'requestSync'
  );
  return record.since ? { since: new Date(record.since) } : {};
}

function parsePayload(payload: Buffer): unknown {
  return parseJson(payload.toString('utf-8'), 'payload');
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`Malformed ${what} JSON`, { cause: error });
  }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') || '(root)' : '(root)';
    throw new DecodeError(`Invalid ${what} at ${where}: ${issue?.message ?? 'unknown'}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

// =============================================================================
// Framing
// =============================================================================

/**
 * Largest accepted line in bytes.
 */
export const DEFAULT_MAX_LINE_BYTES = 65_536;

export interface LineSplitterOptions {
  /** Longest accepted line in UTF-8 bytes (default: 65536) */
  maxLineBytes?: number;
  /** Told about every discarded oversized line */
  onOverflow?: (error: DecodeError) => void;
}

/**
 * Splits a byte stream into complete lines.
 *
 * Partial lines are held until their newline arrives. Multi-byte
 * characters split across chunks are reassembled. A line longer than
 * `maxLineBytes` is discarded up to its newline and reported through
 * `onOverflow`; the lines after it are unaffected.
 */
export class LineSplitter {
  private readonly decoder = new StringDecoder('utf8');
  private readonly maxLineBytes: number;
  private readonly onOverflow: (error: DecodeError) => void;
  private buffer = '';
  /** Inside an oversized line: drop input until the next newline */
  private discarding = false;

  constructor(options: LineSplitterOptions = {}) {
    this.maxLineBytes = options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;
    this.onOverflow = options.onOverflow ?? (() => undefined);
  }

  push(chunk: Buffer | string): string[] {
    let text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

    if (this.discarding) {
      const newline = text.indexOf('\n');
      if (newline === -1) return [];
      text = text.slice(newline + 1);
      this.discarding = false;
    }

    const parts = (this.buffer + text).split('\n');
    this.buffer = parts.pop() ?? '';

    const lines: string[] = [];
    for (const part of parts) {
      if (Buffer.byteLength(part, 'utf8') > this.maxLineBytes) {
        this.overflow();
        continue;
      }
      const line = part.trim();
      if (line.length > 0) lines.push(line);
    }

    if (Buffer.byteLength(this.buffer, 'utf8') > this.maxLineBytes) {
      this.buffer = '';
      this.discarding = true;
      this.overflow();
    }

    return lines;
  }

  /**
   * Bytes received after the last newline.
   */
  pending(): string {
    return this.buffer;
  }

  private overflow(): void {
    this.onOverflow(new DecodeError(`Line exceeds ${String(this.maxLineBytes)} bytes`));
  }
}
