import type { GridPosition } from '../field/GridPosition';

// Gates
export type GateType = 'standard' | 'elite' | 'support' | 'summoner' | 'fortress';

export type GateSpawnPattern =
  | 'none'
  | 'patternA' // every turn once the interval elapses, 2 enemies
  | 'patternB' // every 3rd turn, 3 enemies
  | 'patternC' // 5 on the first call, then 1 every 2 turns
  | 'periodic'
  | 'onDamage'
  | 'defensive'
  | 'continuous';

export type GateStrategicEffect =
  | 'none'
  | 'buffAllEnemies'
  | 'attackBoost'
  | 'defenseBoost'
  | 'regeneration';

// Weapons
export type AttackAttribute = 'fire' | 'ice' | 'thunder' | 'wind' | 'earth' | 'light' | 'dark' | 'none';

export type WeaponType = 'sword' | 'axe' | 'spear' | 'bow' | 'gun' | 'shield' | 'magic' | 'tool';

export type AttackRange =
  | 'singleFront' // front enemy of the column, else its gate
  | 'singleTarget' // the selected enemy, else behaves like singleFront
  | 'row1'
  | 'row2'
  | 'column' // every enemy in the column plus its gate
  | 'all'
  | 'self';

export interface WeaponData {
  name: string;
  attribute: AttackAttribute;
  weaponType: WeaponType;
  basePower: number; // 0-200
  range: AttackRange;
  criticalRate: number; // percent
  cooldownTurns: number;
  canUseConsecutively: boolean;
}

// Combos
export interface ComboStep {
  weaponIndex?: number;
  attribute?: AttackAttribute;
  weaponType?: WeaponType;
  /** Player base attack + weapon base power must reach this */
  minPower?: number;
}

export type ComboEffectType = 'damageMultiplier' | 'additionalAction' | 'healing';

export interface ComboEffect {
  type: ComboEffectType;
  value: number;
}

export interface ComboDefinition {
  name: string;
  steps: ComboStep[];
  effects: ComboEffect[];
  /** Turns allowed between the first step and completion; 0 = no limit */
  maxTurnInterval: number;
  priority: number;
}

// Enemies
export type EnemyCategory = 'vanguard' | 'attacker' | 'support' | 'special';

export type EnemyActionType =
  | 'attack'
  | 'defendAlly'
  | 'buffAlly'
  | 'debuffPlayer'
  | 'heal'
  | 'summon'
  | 'noAction';

export interface EnemyData {
  id: number;
  name: string;
  category: EnemyCategory;
  baseHealth: number;
  attackPower: number;
  defense: number;
  primaryAction: EnemyActionType;
}

// Cards and hand
export interface CardData {
  /** Stable per hand generation: `${weaponName}:${weaponIndex}:${column}` */
  cardId: string;
  weapon: WeaponData;
  /** Index into the player's equipped weapons */
  weaponIndex: number;
  targetColumn: number;
  displayName: string;
}

export type HandState = 'empty' | 'generated' | 'cardUsed' | 'turnEnded';

// Turn flow
export type GameState = 'initializing' | 'playerTurn' | 'enemyTurn' | 'victory' | 'defeat';

export type TurnEndReason = 'manual' | 'actionsExhausted' | 'timeout';

export type BattleEndCondition = 'allGatesDestroyed' | 'allEnemiesDefeated' | 'playerDefeated' | 'turnLimit';

export interface BattleResult {
  isVictory: boolean;
  condition: BattleEndCondition;
  turnsUsed: number;
  totalDamageDealt: number;
  totalDamageTaken: number;
  enemiesDefeated: number;
  gatesDestroyed: number;
  destructionRewards: number;
}

// Rejections: every failed command leaves the battle unchanged
export type RejectionReason = 'invalidInput' | 'statePrecondition' | 'resolutionFailure';

export interface Rejection {
  ok: false;
  reason: RejectionReason;
  message: string;
}

export type Outcome<T> = { ok: true; value: T } | Rejection;

export function reject(reason: RejectionReason, message: string): Rejection {
  return { ok: false, reason, message };
}

// Target selection
export type TargetSelection =
  | { kind: 'none' }
  | { kind: 'column'; column: number }
  | { kind: 'enemy'; column: number; position: GridPosition };

// Damage
export interface DamageBreakdown {
  baseDamage: number;
  comboMultiplier: number;
  comboDamage: number;
  otherMultiplier: number;
  otherDamage: number;
  finalDamage: number;
  critical: boolean;
  criticalMultiplier: number;
}

export interface EnemySnapshot {
  instanceId: string;
  name: string;
  position: GridPosition;
  health: number;
  maxHealth: number;
  assignedGateId: number;
}

export interface GateSnapshot {
  gateId: number;
  gateType: GateType;
  column: number;
  health: number;
  maxHealth: number;
}

export interface PendingDamageInfo {
  readonly card: CardData;
  readonly slotIndex: number;
  readonly breakdown: DamageBreakdown;
  readonly targetEnemies: readonly EnemySnapshot[];
  readonly targetGates: readonly GateSnapshot[];
  /** Damage each target gate takes after its type's reduction, same order as targetGates. */
  readonly gateDamage: readonly number[];
  readonly description: string;
  readonly simulated: boolean;
}

export interface ComboOutcome {
  completedCombos: string[];
  damageMultiplier: number;
  bonusActions: number;
  healing: number;
}

export interface CardPlayResult {
  slotIndex: number;
  card: CardData;
  damageDealt: number;
  targetsHit: number;
  combo: ComboOutcome;
  turnEndScheduled: boolean;
}

// Events
export interface BattleEventPayloads {
  TurnChanged: { turn: number };
  GameStateChanged: { previous: GameState; state: GameState };
  PlayerDataChanged: { health: number; maxHealth: number; baseAttackPower: number };
  PlayerDamaged: { amount: number; health: number; sourceId: string };
  HandGenerated: { cards: (CardData | null)[] };
  HandCleared: Record<string, never>;
  HandStateChanged: { previous: HandState; state: HandState };
  CardPlayed: CardPlayResult;
  CardPlayResult: { slotIndex: number; success: boolean; message: string };
  PendingDamageCalculated: { pending: PendingDamageInfo };
  PendingDamageApplied: { pending: PendingDamageInfo; damageDealt: number };
  PendingDamageCleared: Record<string, never>;
  ActionsChanged: { remaining: number; max: number };
  ActionsExhausted: { max: number };
  AutoTurnEnd: { delaySeconds: number };
  TurnEnded: { reason: TurnEndReason };
  EnemySpawned: { enemy: EnemySnapshot; gateId: number };
  EnemyDamaged: { enemy: EnemySnapshot; amount: number };
  EnemyDefeated: { enemy: EnemySnapshot };
  GateDamaged: { gate: GateSnapshot; amount: number };
  GateDestroyed: { gate: GateSnapshot; reward: number };
  GateEffectApplied: { gateId: number; effect: GateStrategicEffect; affected: number };
  ComboStarted: { combo: string };
  ComboProgressed: { combo: string; step: number; totalSteps: number };
  ComboCompleted: { combo: string; damageMultiplier: number; bonusActions: number; healing: number };
  ComboExpired: { combo: string };
  TargetSelected: { selection: TargetSelection };
  TargetCleared: Record<string, never>;
  BattleEnded: { result: BattleResult };
}

export type BattleEventType = keyof BattleEventPayloads;

export interface BattleEvent<K extends BattleEventType = BattleEventType> {
  type: K;
  turn: number;
  timestamp: number;
  data: BattleEventPayloads[K];
}
