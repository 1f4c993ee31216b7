import { describe, it, expect } from 'vitest';
import { GATE_TEMPLATES } from '../../../src/engine/data/GateTemplates';
import { Gate } from '../../../src/engine/field/Gate';
import { GateSpawnScheduler } from '../../../src/engine/systems/GateSpawnScheduler';
import { createTestContext } from '../testContext';

describe('GateSpawnScheduler', () => {
  describe('decide', () => {
    it('Pattern A spawns 2 once the interval has elapsed', () => {
      const gate = new Gate(0, 0, GATE_TEMPLATES.standard);
      expect(GateSpawnScheduler.decide(gate, 1)).toEqual({ eligible: false, count: 0 });
      expect(GateSpawnScheduler.decide(gate, 2)).toEqual({ eligible: true, count: 2 });
    });

    it('Pattern B needs at least 3 turns even with a shorter interval', () => {
      const gate = new Gate(0, 0, GATE_TEMPLATES.support, { summonInterval: 1 });
      expect(GateSpawnScheduler.decide(gate, 1).eligible).toBe(false);
      expect(GateSpawnScheduler.decide(gate, 2)).toEqual({ eligible: true, count: 3 });
    });

    it('Pattern C spawns 5 first, then 1 every 2 turns', () => {
      const gate = new Gate(0, 0, GATE_TEMPLATES.summoner);
      expect(GateSpawnScheduler.decide(gate, 1)).toEqual({ eligible: true, count: 5 });

      gate.firstSummonDone = true;
      gate.lastSummonTurn = 1;
      expect(GateSpawnScheduler.decide(gate, 2).eligible).toBe(false);
      expect(GateSpawnScheduler.decide(gate, 3)).toEqual({ eligible: true, count: 1 });
    });

    it('Periodic fires on multiples of the interval', () => {
      const gate = new Gate(0, 0, GATE_TEMPLATES.standard, { spawnPattern: 'periodic', summonInterval: 2, summonCount: 4 });
      expect(GateSpawnScheduler.decide(gate, 3).eligible).toBe(false);
      expect(GateSpawnScheduler.decide(gate, 4)).toEqual({ eligible: true, count: 4 });
    });

    it('On-damage fires below 80% health', () => {
      const gate = new Gate(0, 0, GATE_TEMPLATES.elite);
      expect(GateSpawnScheduler.decide(gate, 5).eligible).toBe(false);
      gate.takeDamage(7000);
      expect(GateSpawnScheduler.decide(gate, 5).eligible).toBe(false);
      gate.takeDamage(1);
      expect(GateSpawnScheduler.decide(gate, 5)).toEqual({ eligible: true, count: 1 });
    });

    it('Defensive fires below 50% health', () => {
      const gate = new Gate(0, 0, GATE_TEMPLATES.fortress);
      gate.takeDamage(25000);
      expect(GateSpawnScheduler.decide(gate, 10).eligible).toBe(false);
      gate.takeDamage(1);
      expect(GateSpawnScheduler.decide(gate, 10)).toEqual({ eligible: true, count: 1 });
    });

    it('never spawns from a destroyed gate or a gate without a pattern', () => {
      const destroyed = new Gate(0, 0, GATE_TEMPLATES.summoner);
      destroyed.takeDamage(destroyed.maxHealth);
      expect(GateSpawnScheduler.decide(destroyed, 1).eligible).toBe(false);

      const idle = new Gate(1, 1, GATE_TEMPLATES.standard, { spawnPattern: 'none' });
      expect(GateSpawnScheduler.decide(idle, 100).eligible).toBe(false);
    });

    it('Continuous spawns whenever the interval allows', () => {
      const gate = new Gate(0, 0, GATE_TEMPLATES.standard, {
        spawnPattern: 'continuous',
        summonInterval: 1,
        summonCount: 2,
      });
      expect(GateSpawnScheduler.decide(gate, 0)).toEqual({ eligible: true, count: 2 });
    });
  });

  describe('processGates', () => {
    it('spawns 5 then 1 from a summoner gate', () => {
      const { ctx, flow } = createTestContext({
        config: {
          columnCount: 4,
          gates: [{ spawnPattern: 'none' }, {}, { spawnPattern: 'none' }, { spawnPattern: 'none' }],
        },
      });

      flow.turn = 1;
      expect(GateSpawnScheduler.processGates(ctx)).toHaveLength(5);
      flow.turn = 2;
      expect(GateSpawnScheduler.processGates(ctx)).toHaveLength(0);
      flow.turn = 3;
      const third = GateSpawnScheduler.processGates(ctx);
      expect(third).toHaveLength(1);

      expect(ctx.field.aliveEnemyCount()).toBe(6);
      expect(third[0].name).toBe('Summoner Enemy');
      expect(third[0].assignedGateId).toBe(1);
      expect(ctx.events.getHistoryOf('EnemySpawned')).toHaveLength(6);
      expect(ctx.stats.enemiesSpawned).toBe(6);
    });

    it('stops when the grid is full but still records the summon', () => {
      const { ctx, flow } = createTestContext({
        config: { columnCount: 1, gates: [{ spawnPattern: 'patternC' }] },
      });
      flow.turn = 4;

      expect(GateSpawnScheduler.processGates(ctx)).toHaveLength(2);
      const gate = ctx.field.gateInColumn(0);
      expect(gate?.firstSummonDone).toBe(true);
      expect(gate?.lastSummonTurn).toBe(4);
    });

    it('draws from the allowed pool', () => {
      const { ctx } = createTestContext({
        config: { columnCount: 1, gates: [{ spawnPattern: 'continuous', summonInterval: 1, allowedEnemyIds: [201] }] },
      });

      const spawned = GateSpawnScheduler.processGates(ctx);
      expect(spawned.map((e) => e.name)).toEqual(['Raider']);
    });

    it('falls back to the gate default for an unknown id', () => {
      const { ctx } = createTestContext({
        config: { columnCount: 1, gates: [{ spawnPattern: 'continuous', summonInterval: 1, allowedEnemyIds: [999] }] },
      });

      const spawned = GateSpawnScheduler.processGates(ctx);
      expect(spawned.map((e) => e.data.id)).toEqual([104]);
    });
  });
});
