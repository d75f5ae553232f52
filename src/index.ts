export const VERSION = '0.3.0';

export { loadConfig, resolveDataPaths, type WorldviewConfig } from './core/config.js';
export { WorldviewPipeline, type CycleReport, type PipelineEvents } from './core/pipeline.js';
export { busyMessage, withCycleLock } from './core/cycle_lock.js';
export {
  WorldviewError,
  IngestionGap,
  MalformedSignal,
  ExecutionFailure,
  StateCorruption,
} from './core/errors.js';
export { Logger } from './core/logger.js';
export { reflect, trustDelta } from './core/reflection.js';
export { settleOutcomes, TradeLogOutcomeProvider, type OutcomeProvider } from './core/resolver.js';
export { decide, positionSize, type DecisionBatch, type RiskLimits } from './decision/engine.js';
export type { ExecutionAdapter, SubmitResult } from './execution/executor.js';
export { PaperExecutor } from './execution/modes/paper.js';
export { ConfigProxyResolver, type ProxyResolver } from './execution/proxy.js';
export { applyTrade, recordDecisions, reconcilePortfolio, revalue } from './execution/recorder.js';
export { runIngestion, appendHumanSignal, generateSignalId } from './intel/pipeline.js';
export { parseAlphaSignal, type AlphaSignal } from './intel/schema.js';
export { FileSignalSource, StaticSignalSource, type SignalSource } from './intel/sources.js';
export { SignalStore } from './intel/store.js';
export { synthesize, closeTheses, type TrustLookup } from './worldview/synthesizer.js';
export { createSectorTaxonomy, type SectorTaxonomy } from './worldview/taxonomy.js';
export type { WorldviewState, Thesis, Belief, SectorView } from './worldview/types.js';
