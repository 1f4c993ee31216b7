export { BattleSession } from './engine/core/BattleSession';
export type { BattleSessionOptions } from './engine/core/BattleSession';
export type { BattleContext, BattleStats } from './engine/core/BattleContext';
export { DeferredTasks } from './engine/core/DeferredTasks';
export { DiceRoller } from './engine/core/DiceRoller';
export { EventBusImpl } from './engine/core/EventBus';
export type { EventBus } from './engine/core/EventBus';
export { createLogger, silentLogger } from './engine/core/Logger';
export type { Logger, LogLevel } from './engine/core/Logger';

export { parseBattleConfig, loadBattleConfigFile, DEFAULT_BATTLE_CONFIG } from './engine/data/BattleConfig';
export type { BattleConfig, BattleConfigInput } from './engine/data/BattleConfig';
export { EnemyCatalog, parseEnemyCatalog } from './engine/data/EnemyCatalog';
export { WeaponCatalog, parseWeaponCatalog, DEFAULT_LOADOUT } from './engine/data/WeaponCatalog';
export { parseComboCatalog, bundledCombos } from './engine/data/ComboCatalog';
export { GATE_TEMPLATES, gateTypeForLayout, gateLayout } from './engine/data/GateTemplates';

export { GridField } from './engine/field/GridField';
export { Gate } from './engine/field/Gate';
export { EnemyInstance } from './engine/field/EnemyInstance';
export { PlayerState } from './engine/field/PlayerState';
export { gridPosition, positionKey, samePosition, NO_POSITION } from './engine/field/GridPosition';
export type { GridPosition } from './engine/field/GridPosition';

export { GateSpawnScheduler } from './engine/systems/GateSpawnScheduler';
export { ComboEngine } from './engine/systems/ComboEngine';
export { DamagePipeline } from './engine/systems/DamagePipeline';
export { ActionEconomy } from './engine/systems/ActionEconomy';
export { TurnStateMachine } from './engine/systems/TurnStateMachine';
export { HandController } from './engine/systems/HandController';

export { BattleLog, formatBattleEvent } from './ui/BattleLog';

export * from './engine/types';
