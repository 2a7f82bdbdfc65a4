/**
 * Network module exports.
 */

export type {
  MessageType,
  NetworkEnvelope,
  ShareTruthsPayload,
  RequestSyncPayload,
  EnvelopeRecord,
} from './envelope.js';
export {
  MESSAGE_TYPES,
  LineSplitter,
  createEnvelope,
  encodeEnvelope,
  decodeEnvelope,
  introduceEnvelope,
  shareTruthsEnvelope,
  requestSyncEnvelope,
  decodeIntroducePayload,
  decodeShareTruthsPayload,
  decodeRequestSyncPayload,
} from './envelope.js';
export type {
  PeerMind,
  PeerAddress,
  PeerServiceConfig,
  KnownPeer,
  ConnectionInfo,
} from './peer-service.js';
export { PeerService, createPeerService } from './peer-service.js';
