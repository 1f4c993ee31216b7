import { describe, it, expect } from 'vitest';
import { BattleSession, type BattleSessionOptions } from '../../../src/engine/core/BattleSession';
import { silentLogger } from '../../../src/engine/core/Logger';
import { EnemyCatalog } from '../../../src/engine/data/EnemyCatalog';
import { gridPosition } from '../../../src/engine/field/GridPosition';
import { testEnemy, testWeapon } from '../testContext';

const DUMMY_ID = 900;

function createSession(options: BattleSessionOptions = {}): BattleSession {
  return new BattleSession({
    weapons: [testWeapon()],
    combos: [],
    enemies: new EnemyCatalog([...EnemyCatalog.bundled().all(), testEnemy({ id: DUMMY_ID })]),
    logger: silentLogger,
    ...options,
    config: {
      baseCriticalChance: 0,
      gates: [{ spawnPattern: 'none' }, { spawnPattern: 'none' }, { spawnPattern: 'none' }],
      ...options.config,
    },
  });
}

describe('BattleSession', () => {
  describe('start', () => {
    it('enters turn 1 of the player phase with a fresh hand', () => {
      const session = createSession();
      expect(session.getState()).toBe('initializing');

      expect(session.start()).toEqual({ ok: true, value: 'playerTurn' });
      expect(session.getTurn()).toBe(1);
      expect(session.getHandState()).toBe('generated');
      expect(session.getHand()).toHaveLength(5);
      expect(session.getActions()).toEqual({ remaining: 1, max: 1, bonus: 0 });
    });

    it('refuses to start twice', () => {
      const session = createSession();
      session.start();
      expect(session.start()).toMatchObject({ ok: false, reason: 'statePrecondition' });
    });
  });

  describe('endPlayerTurn', () => {
    it('runs the enemy phase and comes back for the next turn', () => {
      const session = createSession();
      session.start();

      expect(session.endPlayerTurn()).toEqual({ ok: true, value: 'playerTurn' });
      expect(session.getTurn()).toBe(2);
      const states = session.getEventBus().getHistoryOf('GameStateChanged').map((e) => e.data.state);
      expect(states).toEqual(['playerTurn', 'enemyTurn', 'playerTurn']);
      expect(session.getEventBus().getHistoryOf('TurnEnded')[0].data.reason).toBe('manual');
    });

    it('is rejected outside the player turn', () => {
      const session = createSession();
      expect(session.endPlayerTurn()).toMatchObject({ ok: false, reason: 'statePrecondition' });
    });
  });

  describe('outcome', () => {
    it('ends in defeat when the player falls', () => {
      const session = createSession({ config: { player: { maxHealth: 1000 } } });
      session.start();
      session.placeEnemy(DUMMY_ID, gridPosition(0, 0));
      session.placeEnemy(104, gridPosition(1, 0));

      session.endPlayerTurn();

      expect(session.getState()).toBe('defeat');
      expect(session.getResult()).toMatchObject({ isVictory: false, condition: 'playerDefeated', turnsUsed: 1 });
    });

    it('ends in defeat on reaching the turn limit', () => {
      const session = createSession({ config: { maxTurns: 2 } });
      session.start();
      session.endPlayerTurn();

      expect(session.getState()).toBe('defeat');
      expect(session.getResult()?.condition).toBe('turnLimit');
      expect(session.getTurn()).toBe(2);
    });

    it('does not count an empty field as a win before anything spawned', () => {
      const session = createSession();
      session.start();
      session.update(0.1);
      expect(session.getState()).toBe('playerTurn');
    });

    it('clears the hand and rejects further commands after the battle ends', () => {
      const session = createSession({ config: { maxTurns: 2 } });
      session.start();
      session.endPlayerTurn();

      expect(session.getHand().every((c) => c === null)).toBe(true);
      expect(session.getHandState()).toBe('empty');
      expect(session.playCard(0)).toEqual({
        ok: false,
        reason: 'statePrecondition',
        message: 'Cards cannot be played during defeat',
      });
      expect(session.selectColumnTarget(0)).toMatchObject({ ok: false, reason: 'statePrecondition' });
      expect(session.addActionBonus(1)).toMatchObject({ ok: false, reason: 'statePrecondition' });
      expect(session.getEventBus().getHistoryOf('BattleEnded')).toHaveLength(1);
    });
  });

  describe('turn timer', () => {
    it('ends the turn with a timeout once the limit is reached', () => {
      const session = createSession({ config: { turnTimeLimitSeconds: 10 } });
      session.start();

      session.update(6);
      expect(session.getTurn()).toBe(1);
      session.update(4);

      expect(session.getTurn()).toBe(2);
      expect(session.getEventBus().getHistoryOf('TurnEnded')[0].data.reason).toBe('timeout');
    });
  });

  describe('turn timer after an automatic end', () => {
    it('starts the next turn with a full time limit', () => {
      const session = createSession({ config: { turnTimeLimitSeconds: 1 } });
      session.start();
      session.playCard(0);

      session.update(1);
      expect(session.getTurn()).toBe(2);
      session.update(0.5);
      expect(session.getTurn()).toBe(2);
      session.update(0.5);

      expect(session.getTurn()).toBe(3);
      const reasons = session.getEventBus().getHistoryOf('TurnEnded').map((e) => e.data.reason);
      expect(reasons).toEqual(['actionsExhausted', 'timeout']);
    });

    it('ignores a NaN step without stalling the clock', () => {
      const session = createSession();
      session.start();
      session.playCard(0);

      session.update(Number.NaN);
      expect(session.getTime()).toBe(0);
      session.update(0.5);

      expect(session.getTurn()).toBe(2);
    });
  });

  describe('commands', () => {
    it('validates enemy placement', () => {
      const session = createSession();
      session.start();

      expect(session.placeEnemy(12345, gridPosition(0, 0))).toMatchObject({ ok: false, reason: 'invalidInput' });
      expect(session.placeEnemy(DUMMY_ID, gridPosition(0, 0))).toMatchObject({
        ok: true,
        value: { instanceId: 'enemy_1', assignedGateId: 0 },
      });
      expect(session.placeEnemy(DUMMY_ID, gridPosition(0, 0))).toMatchObject({ ok: false, reason: 'invalidInput' });
    });

    it('validates action bonuses', () => {
      const session = createSession();
      session.start();

      expect(session.addActionBonus(0)).toMatchObject({ ok: false, reason: 'invalidInput' });
      expect(session.addActionBonus(2)).toEqual({ ok: true, value: { remaining: 3, max: 3, bonus: 2 } });
    });

    it('reselects the last target', () => {
      const session = createSession();
      session.start();
      session.selectColumnTarget(2);
      session.clearTargetSelection();

      expect(session.getSelection()).toEqual({ kind: 'none' });
      expect(session.reselectLastTarget()).toEqual({ ok: true, value: { kind: 'column', column: 2 } });
      expect(session.getHand()[0]?.targetColumn).toBe(2);
    });
  });

  describe('resetBattle', () => {
    it('restarts from turn 1 with the same seed', () => {
      const session = createSession();
      session.start();
      session.placeEnemy(DUMMY_ID, gridPosition(0, 0));
      session.playCard(0);
      session.update(1);
      session.addActionBonus(1);

      expect(session.resetBattle()).toEqual({ ok: true, value: 'playerTurn' });

      expect(session.getTurn()).toBe(1);
      expect(session.getField().aliveEnemyCount()).toBe(0);
      expect(session.getStats().cardsPlayed).toBe(0);
      expect(session.getActions()).toEqual({ remaining: 1, max: 1, bonus: 0 });
      expect(session.getTime()).toBe(0);
      expect(session.getEventHistory()[0].type).toBe('GameStateChanged');
    });
  });
});
