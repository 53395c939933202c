/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS — PUBLIC SURFACE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * NO runtime logic at import time. The process entrypoint is start.ts.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export { bootstrap } from './bootstrap';
export type { BootstrapOptions, BootstrapResult } from './bootstrap';
export { loadConfig, describeConfig, ConfigError } from './config';
export type { AppConfig, TradingConfig, ExchangeConfig, LoggingConfig, EntryStrategyName, ProtectionMode } from './config';
export { getPairSpec } from './config/pairs';
export type { PairSpec } from './config/pairs';
export { TradingEngine } from './engine/TradingEngine';
export type { TradingEngineDependencies, EngineStatistics } from './engine/TradingEngine';
export { waitForFill } from './engine/fillWait';
export { createEntryStrategy } from './engine/entryStrategy';
export type { EntryStrategy, EntryPlan } from './engine/entryStrategy';
export { ExchangeGateway } from './exchange/gateway';
export * from './exchange/errors';
export type { ExchangeClient } from './exchange/types';
export { ScanLoop } from './runtime/scanLoop';
export { RsiSignalSource, calculateRsi } from './scoring/rsiSignal';
export type { SignalSource } from './scoring/rsiSignal';
export { recoverPositions, reconstructPositions } from './services/positionRecovery';
export { OrderStore } from './storage/orderStore';
export { PositionStore } from './storage/positionStore';
export * from './types';
