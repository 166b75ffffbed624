/**
 * Transcript Module
 *
 * JSON snapshots of game states, a recorder that follows an engine's
 * events, and replay of recorded games.
 */
export const TRANSCRIPT_VERSION = '0.1.0';

export type {
  PlayerSnapshot,
  StateSnapshot,
  TurnRecord,
  GameMetadata,
  GameResults,
  GameTranscript,
  ReplayOptions,
  ReplayResult,
} from './GameTranscript';
export {
  snapshotPlayer,
  snapshotState,
  TranscriptRecorder,
  replayTranscript,
} from './GameTranscript';
