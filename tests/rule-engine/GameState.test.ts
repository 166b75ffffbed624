import { describe, it, expect } from 'vitest';
import { GameState, rankWinner } from '../../src/rule-engine/GameState';
import { Player } from '../../src/rule-engine/Player';
import { InvariantViolation } from '../../src/core-engine/EngineErrors';
import { buildState, freeCards, makeCard, makePlayer } from '../helpers/fixtures';

describe('GameState', () => {
  // -------------------------------------------------------------------------
  // Construction
  // -------------------------------------------------------------------------
  describe('construction', () => {
    it('rejects a player list that does not match the config', () => {
      const players = [Player.create(0), Player.create(1), Player.create(2)];
      expect(() => buildState({ players })).toThrow(InvariantViolation);
      expect(() => buildState({ players })).toThrow('Expected 2 players, got 3');
    });

    it('freezes itself and its containers', () => {
      const state = buildState({ visible: { 1: [makeCard('a')] } });
      expect(Object.isFrozen(state)).toBe(true);
      expect(Object.isFrozen(state.players)).toBe(true);
      expect(Object.isFrozen(state.visible)).toBe(true);
      expect(Object.isFrozen(state.visible[1])).toBe(true);
    });

    it('exposes the current player', () => {
      const state = buildState({ currentPlayerIndex: 1 });
      expect(state).toBeInstanceOf(GameState);
      expect(state.numPlayers).toBe(2);
      expect(state.currentPlayer.id).toBe(1);
    });
  });

  // -------------------------------------------------------------------------
  // Queries and copy-with-change
  // -------------------------------------------------------------------------
  describe('copy-with-change', () => {
    it('finds a face-up card with its tier and slot', () => {
      const state = buildState({
        visible: { 1: [makeCard('a')], 2: [makeCard('b', { tier: 2 }), makeCard('c', { tier: 2 })] },
      });
      const found = state.findVisibleCard('c');
      expect(found?.tier).toBe(2);
      expect(found?.index).toBe(1);
      expect(state.findVisibleCard('zz')).toBeUndefined();
    });

    it('replaces fields without touching the original', () => {
      const state = buildState();
      const next = state.with({ turnNumber: 4 });
      expect(next).not.toBe(state);
      expect(next.turnNumber).toBe(4);
      expect(state.turnNumber).toBe(0);
    });

    it('replaces one player', () => {
      const state = buildState();
      const next = state.withPlayer(1, makePlayer(1, { tokens: { onyx: 2 } }));
      expect(next.players[1].tokenCount).toBe(2);
      expect(next.players[0]).toBe(state.players[0]);
    });

    it('refills a taken slot in place from the top of the deck', () => {
      const state = buildState({
        visible: { 1: ['a', 'b', 'c', 'd'].map(id => makeCard(id)) },
        decks: { 1: [makeCard('e'), makeCard('f')] },
      });
      const next = state.removeVisibleAt(1, 1);
      expect(next.visible[1].map(c => c.id)).toEqual(['a', 'e', 'c', 'd']);
      expect(next.decks[1].map(c => c.id)).toEqual(['f']);
    });

    it('shrinks the row when the deck is empty', () => {
      const state = buildState({ visible: { 3: ['a', 'b', 'c'].map(id => makeCard(id, { tier: 3 })) } });
      expect(state.removeVisibleAt(3, 0).visible[3].map(c => c.id)).toEqual(['b', 'c']);
    });
  });

  // -------------------------------------------------------------------------
  // Turn order and end of game
  // -------------------------------------------------------------------------
  describe('advanceTurn', () => {
    it('counts a round only when play wraps to seat 0', () => {
      const first = buildState().advanceTurn();
      expect(first.currentPlayerIndex).toBe(1);
      expect(first.turnNumber).toBe(0);

      const second = first.advanceTurn();
      expect(second.currentPlayerIndex).toBe(0);
      expect(second.turnNumber).toBe(1);
    });
  });

  describe('checkWinner', () => {
    const champion = makePlayer(0, { cards: freeCards('p', 'ruby', 3, 5) });

    it('opens the final round without ending the game', () => {
      const state = buildState({ players: [champion, Player.create(1)] }).checkWinner();
      expect(state.isFinalRound).toBe(true);
      expect(state.firstPlayerToWin).toBe(0);
      expect(state.gameOver).toBe(false);
    });

    it('does nothing below the threshold', () => {
      const state = buildState().checkWinner();
      expect(state.isFinalRound).toBe(false);
      expect(state.firstPlayerToWin).toBeNull();
    });

    it('ends the game when play would return to the triggering seat', () => {
      const state = buildState({
        players: [champion, Player.create(1)],
        currentPlayerIndex: 1,
        isFinalRound: true,
        firstPlayerToWin: 0,
      }).checkWinner();
      expect(state.gameOver).toBe(true);
      expect(state.winner).toBe(0);
    });

    it('lets the remaining seats play when a later seat triggers', () => {
      const late = makePlayer(1, { cards: freeCards('q', 'onyx', 3, 5) });
      const state = buildState({ players: [Player.create(0), late], currentPlayerIndex: 1 }).checkWinner();
      expect(state.isFinalRound).toBe(true);
      expect(state.firstPlayerToWin).toBe(1);
      expect(state.gameOver).toBe(false);
    });

    it('keeps the first trigger seat once the final round is open', () => {
      const state = buildState({
        config: { playerCount: 3 },
        players: [champion, makePlayer(1, { cards: freeCards('q', 'onyx', 4, 5) }), Player.create(2)],
        currentPlayerIndex: 1,
        isFinalRound: true,
        firstPlayerToWin: 0,
      }).checkWinner();
      expect(state.firstPlayerToWin).toBe(0);
      expect(state.gameOver).toBe(false);
    });
  });

  describe('rankWinner', () => {
    it('picks the most points', () => {
      expect(rankWinner([
        makePlayer(0, { cards: freeCards('a', 'ruby', 1, 3) }),
        makePlayer(1, { cards: freeCards('b', 'ruby', 1, 4) }),
      ])).toBe(1);
    });

    it('breaks a points tie by fewer owned cards', () => {
      expect(rankWinner([
        makePlayer(0, { cards: freeCards('a', 'ruby', 3, 4) }),
        makePlayer(1, { cards: freeCards('b', 'ruby', 2, 6) }),
      ])).toBe(1);
    });

    it('breaks a full tie by the lower seat', () => {
      expect(rankWinner([
        Player.create(0),
        Player.create(1),
        Player.create(2),
      ])).toBe(0);
    });
  });
});
