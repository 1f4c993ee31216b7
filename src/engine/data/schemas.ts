import { z } from 'zod/v4';

export const AttackAttributeSchema = z.enum(['fire', 'ice', 'thunder', 'wind', 'earth', 'light', 'dark', 'none']);

export const WeaponTypeSchema = z.enum(['sword', 'axe', 'spear', 'bow', 'gun', 'shield', 'magic', 'tool']);

export const AttackRangeSchema = z.enum(['singleFront', 'singleTarget', 'row1', 'row2', 'column', 'all', 'self']);

export const WeaponDataSchema = z.object({
  name: z.string().min(1),
  attribute: AttackAttributeSchema,
  weaponType: WeaponTypeSchema,
  // Out-of-range power is clamped when equipped
  basePower: z.number().int(),
  range: AttackRangeSchema,
  criticalRate: z.number().min(0).max(100).default(0),
  cooldownTurns: z.number().int().min(0).default(0),
  canUseConsecutively: z.boolean().default(true),
});

export const EnemyDataSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  category: z.enum(['vanguard', 'attacker', 'support', 'special']),
  baseHealth: z.number().int().positive(),
  attackPower: z.number().int().min(0),
  defense: z.number().int().min(0).default(0),
  primaryAction: z.enum(['attack', 'defendAlly', 'buffAlly', 'debuffPlayer', 'heal', 'summon', 'noAction']),
});

export const ComboStepSchema = z
  .object({
    weaponIndex: z.number().int().min(0).optional(),
    attribute: AttackAttributeSchema.optional(),
    weaponType: WeaponTypeSchema.optional(),
    minPower: z.number().min(0).optional(),
  })
  .refine(
    (step) =>
      step.weaponIndex !== undefined ||
      step.attribute !== undefined ||
      step.weaponType !== undefined ||
      step.minPower !== undefined,
    { message: 'A combo step needs at least one requirement' }
  );

export const ComboDefinitionSchema = z.object({
  name: z.string().min(1),
  steps: z.array(ComboStepSchema).min(1),
  effects: z.array(
    z.object({
      type: z.enum(['damageMultiplier', 'additionalAction', 'healing']),
      value: z.number(),
    })
  ),
  maxTurnInterval: z.number().int().min(0).default(0),
  priority: z.number().int().default(0),
});

export const GateOverridesSchema = z.object({
  spawnPattern: z
    .enum(['none', 'patternA', 'patternB', 'patternC', 'periodic', 'onDamage', 'defensive', 'continuous'])
    .optional(),
  summonInterval: z.number().int().min(1).optional(),
  summonCount: z.number().int().min(0).optional(),
  allowedEnemyIds: z.array(z.number().int()).optional(),
  maxHealth: z.number().int().positive().optional(),
  strategicEffect: z.enum(['none', 'buffAllEnemies', 'attackBoost', 'defenseBoost', 'regeneration']).optional(),
  effectStrength: z.number().positive().optional(),
});

export const BattleConfigSchema = z.object({
  columnCount: z.number().int().min(1).max(12).default(3),
  maxTurns: z.number().int().min(1).default(50),
  handSize: z.number().int().min(1).default(5),
  baseActionsPerTurn: z.number().int().min(1).default(1),
  autoEndTurnOnExhaustion: z.boolean().default(true),
  autoEndTurnDelaySeconds: z.number().min(0).default(0.5),
  // 0 disables the turn timer
  turnTimeLimitSeconds: z.number().min(0).default(0),
  maxActiveCombos: z.number().int().min(1).default(5),
  // Added to each weapon's own criticalRate (percent)
  baseCriticalChance: z.number().min(0).max(1).default(0.05),
  criticalMultiplier: z.number().min(1).default(1.5),
  seed: z.number().int().default(1),
  player: z
    .object({
      maxHealth: z.number().int().positive().default(15000),
      baseAttackPower: z.number().int().min(0).default(100),
    })
    .prefault({}),
  /** Per-column gate tweaks, index = column */
  gates: z.array(GateOverridesSchema).default([]),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});
