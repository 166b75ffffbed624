/**
 * Tests for GameTranscript -- snapshots, TranscriptRecorder and replay.
 */

import { describe, it, expect } from 'vitest';
import {
  TranscriptRecorder,
  replayTranscript,
  snapshotPlayer,
  snapshotState,
} from '../../src/transcript/GameTranscript';
import type { GameTranscript } from '../../src/transcript/GameTranscript';
import { GameEngine } from '../../src/rule-engine/GameEngine';
import { purchaseVisible, takeDifferent, takeSame } from '../../src/rule-engine/Actions';
import { AiPlayer, PurchaseFirstStrategy } from '../../src/ai/AiStrategy';
import { playGame } from '../../src/ai/GameRunner';
import { createRng } from '../../src/core-engine/SeededRng';
import { silentLogger } from '../../src/core-engine/Logger';
import {
  MalformedActionError,
  ReplayError,
  RuleViolation,
  SequenceError,
} from '../../src/core-engine/EngineErrors';
import { buildState, freeCards, makeCard, makeNoble, makePlayer } from '../helpers/fixtures';

function newEngine(seed = 42): GameEngine {
  return new GameEngine({ seed, logger: silentLogger });
}

function bots(seed: number): AiPlayer[] {
  return [0, 1].map(seat => new AiPlayer(PurchaseFirstStrategy, createRng(seed + seat).asSource()));
}

/** Plain JSON copy, as a transcript read back from disk. */
function viaJson(transcript: GameTranscript): GameTranscript {
  return JSON.parse(JSON.stringify(transcript));
}

function recordGame(seed: number, maxSteps: number, games = 1): GameTranscript {
  const engine = newEngine(seed);
  const recorder = new TranscriptRecorder(engine, ['PurchaseFirst', 'PurchaseFirst']);
  for (let i = 0; i < games; i++) {
    engine.reset();
    playGame(engine, bots(seed + i), { maxSteps });
  }
  return viaJson(recorder.finalize());
}

// ── Snapshots ───────────────────────────────────────────────

describe('snapshotPlayer', () => {
  it('lists holdings by id with derived fields', () => {
    const player = makePlayer(1, {
      tokens: { ruby: 2, gold: 1 },
      cards: [makeCard('a', { bonus: 'onyx', points: 2 })],
      reserved: [makeCard('b')],
      nobles: [makeNoble('n', { onyx: 1 })],
    });
    expect(snapshotPlayer(player)).toEqual({
      id: 1,
      tokens: { ruby: 2, gold: 1 },
      bonuses: { onyx: 1 },
      points: 5,
      tokenCount: 3,
      cards: ['a'],
      reserved: ['b'],
      nobles: ['n'],
    });
  });
});

describe('snapshotState', () => {
  it('shows face-up ids and deck sizes only', () => {
    const state = buildState({
      visible: { 1: [makeCard('v1')] },
      decks: { 1: [makeCard('d1'), makeCard('d2')], 3: [makeCard('d3', { tier: 3 })] },
      nobles: [makeNoble('n', { ruby: 3 })],
    });
    const snap = snapshotState(state);
    expect(snap.visible).toEqual({ 1: ['v1'], 2: [], 3: [] });
    expect(snap.deckSizes).toEqual({ 1: 2, 2: 0, 3: 1 });
    expect(snap.nobles).toEqual(['n']);
    expect(snap.bank).toEqual({ diamond: 4, sapphire: 4, emerald: 4, ruby: 4, onyx: 4, gold: 5 });
    expect(snap.players).toHaveLength(2);
    expect(snap.gameOver).toBe(false);
    expect(snap.winner).toBeNull();
  });

  it('survives a JSON round trip unchanged', () => {
    const snap = snapshotState(newEngine().reset());
    expect(JSON.parse(JSON.stringify(snap))).toEqual(snap);
  });
});

// ── TranscriptRecorder ──────────────────────────────────────

describe('TranscriptRecorder', () => {
  it('has nothing to give before a game starts', () => {
    const recorder = new TranscriptRecorder(newEngine());
    expect(recorder.isRecording).toBe(false);
    expect(() => recorder.getTranscript()).toThrow(SequenceError);
  });

  it('captures the deal and metadata on reset', () => {
    const engine = newEngine(7);
    const recorder = new TranscriptRecorder(engine, ['Greedy', undefined]);
    const state = engine.reset();
    const transcript = recorder.getTranscript();

    expect(recorder.isRecording).toBe(true);
    expect(transcript.version).toBe(1);
    expect(transcript.metadata.seed).toBe(7);
    expect(transcript.metadata.gameIndex).toBe(1);
    expect(transcript.metadata.config).toEqual(state.config);
    expect(transcript.metadata.players).toEqual([
      { seat: 0, strategy: 'Greedy' },
      { seat: 1, strategy: undefined },
    ]);
    expect(transcript.initialState).toEqual(snapshotState(state));
    expect(transcript.turns).toEqual([]);
    expect(transcript.finalState).toBeNull();
  });

  it('records each step with its label and resulting state', () => {
    const engine = newEngine();
    const recorder = new TranscriptRecorder(engine);
    engine.reset();
    engine.step(takeDifferent(['diamond', 'ruby']));
    const after = engine.step(takeSame('onyx'));

    const turns = recorder.getTranscript().turns;
    expect(turns.map(t => [t.step, t.turnNumber, t.playerIndex, t.label])).toEqual([
      [0, 0, 0, 'take W R'],
      [1, 0, 1, 'take 2K'],
    ]);
    expect(turns[1].after).toEqual(snapshotState(after));
    expect(turns[1].after.turnNumber).toBe(1);
    expect(turns[0].nobleId).toBeNull();
  });

  it('does not record rejected actions', () => {
    const engine = newEngine();
    const recorder = new TranscriptRecorder(engine);
    engine.reset();
    expect(() => engine.step(takeSame('gold'))).toThrow(RuleViolation);
    expect(recorder.getTranscript().turns).toHaveLength(0);
  });

  it('notes the noble that visited on a step', () => {
    const engine = newEngine();
    const recorder = new TranscriptRecorder(engine);
    engine.reset();
    engine.restore(
      buildState({
        players: [makePlayer(0, { cards: freeCards('p', 'emerald', 2) }), makePlayer(1)],
        visible: { 1: [makeCard('third', { bonus: 'emerald' })] },
        nobles: [makeNoble('n-green', { emerald: 3 })],
      }),
    );
    engine.step(purchaseVisible('third'));
    engine.step(takeSame('ruby'));

    const turns = recorder.getTranscript().turns;
    expect(turns.map(t => t.nobleId)).toEqual(['n-green', null]);
  });

  it('stamps results on finalize', () => {
    const engine = newEngine();
    const recorder = new TranscriptRecorder(engine);
    engine.reset();
    engine.step(takeSame('emerald'));

    const transcript = recorder.finalize();
    expect(transcript.metadata.endedAt).not.toBe('');
    expect(transcript.results).toEqual({ scores: [0, 0], winner: null, rounds: 0, completed: false });
    expect(transcript.finalState).toEqual(snapshotState(engine.state));
  });

  it('starts a fresh transcript on the next reset', () => {
    const engine = newEngine();
    const recorder = new TranscriptRecorder(engine);
    engine.reset();
    engine.step(takeSame('emerald'));
    engine.reset();

    const transcript = recorder.getTranscript();
    expect(transcript.metadata.gameIndex).toBe(2);
    expect(transcript.turns).toHaveLength(0);
  });

  it('stops recording once detached', () => {
    const engine = newEngine();
    const recorder = new TranscriptRecorder(engine);
    engine.reset();
    recorder.detach();
    engine.step(takeSame('emerald'));

    expect(recorder.getTranscript().turns).toHaveLength(0);
    expect(engine.events.listenerCount('turn-completed')).toBe(0);
  });
});

// ── Replay ──────────────────────────────────────────────────

describe('replayTranscript', () => {
  it('reproduces a recorded game', () => {
    const transcript = recordGame(31, 60);
    const { state, steps } = replayTranscript(transcript);

    expect(steps).toBe(transcript.turns.length);
    expect(snapshotState(state)).toEqual(transcript.finalState);
  });

  it('reproduces a later game dealt from the same seed', () => {
    const transcript = recordGame(32, 30, 2);
    expect(transcript.metadata.gameIndex).toBe(2);
    expect(replayTranscript(transcript).steps).toBe(transcript.turns.length);
  });

  it('reproduces a finished game', () => {
    const transcript = recordGame(33, 2000);
    expect(transcript.results?.completed).toBe(true);
    const { state } = replayTranscript(transcript);
    expect(state.gameOver).toBe(true);
    expect(state.winner).toBe(transcript.results?.winner);
  });

  it('rejects something that is not a transcript', () => {
    expect(() => replayTranscript({ version: 2 })).toThrow(ReplayError);
    expect(() => replayTranscript('game.json')).toThrow(/^Not a version 1 transcript: /);
  });

  it('detects a different deal', () => {
    const transcript = recordGame(34, 10);
    transcript.metadata.seed += 1;
    expect(() => replayTranscript(transcript)).toThrow('Initial deal differs from the recording');
  });

  it('detects a different outcome', () => {
    const transcript = recordGame(35, 10);
    if (transcript.finalState) transcript.finalState.turnNumber += 1;
    expect(() => replayTranscript(transcript)).toThrow('Final state differs from the recording');
  });

  it('surfaces an illegal recorded action', () => {
    const transcript = recordGame(36, 10);
    transcript.turns[0].action = takeSame('gold');
    expect(() => replayTranscript(transcript)).toThrow(RuleViolation);
  });

  it('surfaces a malformed recorded action', () => {
    const raw = { ...recordGame(37, 10), turns: [{ action: { type: 'pass' } }] };
    expect(() => replayTranscript(raw)).toThrow(MalformedActionError);
  });
});
