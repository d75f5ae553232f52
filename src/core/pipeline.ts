/**
 * Worldview Pipeline
 *
 * One cycle, under the cycle lock:
 * - read the signals appended since the last committed cursor
 * - synthesize the next worldview against the current trust ledger
 * - gate decisions on risk limits and record what the venue fills
 * - commit the worldview (with its cursor) atomically
 *
 * Reflection runs under the same lock, either at the end of a cycle or on
 * its own.
 */

import { EventEmitter } from 'eventemitter3';

import { decide, type DecisionBatch, type RiskLimits } from '../decision/engine.js';
import type { ExecutionAdapter } from '../execution/executor.js';
import { FileMarkSource, type MarkSource } from '../execution/marks.js';
import { PaperExecutor } from '../execution/modes/paper.js';
import { ConfigProxyResolver, type ProxyResolver } from '../execution/proxy.js';
import { reconcilePortfolio, recordDecisions, revalue } from '../execution/recorder.js';
import type { Trade, TradeDecision } from '../execution/types.js';
import { appendHumanSignal, runIngestion, type HumanSignalInput, type IngestionResult } from '../intel/pipeline.js';
import type { AlphaSignal } from '../intel/schema.js';
import { FileSignalSource, type SignalSource } from '../intel/sources.js';
import { SignalStore } from '../intel/store.js';
import { AlertLog, type AlertInput } from '../memory/alerts.js';
import { expandHome } from '../memory/files.js';
import { PortfolioStore } from '../memory/portfolio.js';
import { TradeLog } from '../memory/trades.js';
import { TrustLedgerStore, trustLookup } from '../memory/trust_ledger.js';
import { WorldviewStore } from '../memory/worldview_store.js';
import { closeTheses, synthesize, type SynthesisReport, type SynthesisSettings } from '../worldview/synthesizer.js';
import { createSectorTaxonomy, type SectorTaxonomy } from '../worldview/taxonomy.js';
import { resolveDataPaths, type DataPaths, type WorldviewConfig } from './config.js';
import { busyMessage, withCycleLock, type LockedRun } from './cycle_lock.js';
import { ExecutionFailure, IngestionGap, MalformedSignal, StateCorruption, errorMessage } from './errors.js';
import { Logger } from './logger.js';
import { reflect, type ReflectionSettings, type TrustUpdate } from './reflection.js';
import { TradeLogOutcomeProvider, settleOutcomes, type OutcomeProvider } from './resolver.js';
import { formatStatusSnapshot } from './status_snapshot.js';

export interface RiskBreach {
  stateId: number;
  drawdown: number;
  maxDrawdown: number;
}

export interface ReflectionReport {
  settled: number;
  pending: number;
  applied: string[];
  updates: TrustUpdate[];
}

export interface CycleReport {
  stateId: number;
  executed: boolean;
  replayedTrades: number;
  synthesis: SynthesisReport;
  decisions: TradeDecision[];
  halted: boolean;
  drawdown: number;
  skipped: DecisionBatch['skipped'];
  trades: Trade[];
  failures: ExecutionFailure[];
  malformed: number;
  /** Result of pulling `ingestion.inbox` ahead of the cycle, when configured. */
  ingestion: IngestionResult | null;
  reflection: ReflectionReport | null;
}

export interface PipelineEvents {
  'risk-breach': (breach: RiskBreach) => void;
  'execution-failure': (failure: ExecutionFailure) => void;
  'ingestion-gap': (gap: IngestionGap) => void;
  'malformed-signal': (error: MalformedSignal) => void;
  'cycle-complete': (report: CycleReport) => void;
  'cycle-aborted': (error: Error) => void;
}

export interface PipelineOptions {
  config: WorldviewConfig;
  logger?: Logger;
  now?: () => Date;
  executor?: ExecutionAdapter;
  outcomes?: OutcomeProvider;
  marks?: MarkSource;
  proxies?: ProxyResolver;
  taxonomy?: SectorTaxonomy;
}

export interface CycleOptions {
  /** When false, decisions are computed and reported but nothing is submitted. */
  execute?: boolean;
}

export class WorldviewPipeline extends EventEmitter<PipelineEvents> {
  readonly paths: DataPaths;
  readonly signals: SignalStore;
  readonly worldviews: WorldviewStore;
  readonly trustLedger: TrustLedgerStore;
  readonly trades: TradeLog;
  readonly portfolios: PortfolioStore;
  readonly alerts: AlertLog;

  private readonly config: WorldviewConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly executor: ExecutionAdapter;
  private readonly outcomes: OutcomeProvider;
  private readonly marks: MarkSource;
  private readonly proxies: ProxyResolver;
  private readonly taxonomy: SectorTaxonomy;

  constructor(options: PipelineOptions) {
    super();
    this.config = options.config;
    this.logger = options.logger ?? new Logger(options.config.logging.level, 'pipeline');
    this.now = options.now ?? (() => new Date());
    this.paths = resolveDataPaths(options.config);

    this.signals = new SignalStore(this.paths.signals);
    this.worldviews = new WorldviewStore(this.paths.worldview, this.paths.history);
    this.trustLedger = new TrustLedgerStore(this.paths.trustLedger);
    this.trades = new TradeLog(this.paths.trades, this.paths.settlements);
    this.portfolios = new PortfolioStore(this.paths.portfolio, options.config.execution.initialEquity);
    this.alerts = new AlertLog(this.paths.alerts, this.now);

    this.marks = options.marks ?? new FileMarkSource(this.paths.marks);
    this.executor = options.executor ?? new PaperExecutor(this.marks);
    this.outcomes = options.outcomes ?? new TradeLogOutcomeProvider(this.trades);
    this.proxies = options.proxies ?? new ConfigProxyResolver(options.config.proxies);
    this.taxonomy =
      options.taxonomy ??
      createSectorTaxonomy({
        sectors: options.config.taxonomy.sectors,
        defaultSector: options.config.taxonomy.defaultSector,
      });
  }

  get riskLimits(): RiskLimits {
    return { ...this.config.risk };
  }

  get synthesisSettings(): SynthesisSettings {
    return { ...this.config.synthesis };
  }

  get reflectionSettings(): ReflectionSettings {
    return {
      learningRate: this.config.reflection.learningRate,
      pnlCap: this.config.reflection.pnlCap,
      attribution: this.config.reflection.attribution,
      defaultTrust: this.config.synthesis.defaultTrust,
    };
  }

  private get lockOptions() {
    return { path: this.paths.lock, ttlMs: this.config.cycle.lockTtlMs, now: this.now };
  }

  async ingest(sources: SignalSource[]): Promise<IngestionResult> {
    const result = await runIngestion(sources, this.signals, {
      timeoutMs: this.config.ingestion.timeoutMs,
      retries: this.config.ingestion.retries,
      logger: this.logger.child('ingest'),
      now: this.now,
    });
    for (const gap of result.gaps) {
      this.raise({ kind: 'ingestion_gap', severity: 'warning', summary: gap.message, metadata: { source: gap.source } });
      this.emit('ingestion-gap', gap);
    }
    for (const error of result.malformed) {
      this.raise({
        kind: 'malformed_signal',
        severity: 'info',
        summary: error.message,
        metadata: { signal_id: error.signalId },
      });
      this.emit('malformed-signal', error);
    }
    return result;
  }

  addHumanSignal(input: HumanSignalInput): AlphaSignal {
    const signal = appendHumanSignal(this.signals, input, this.now());
    this.logger.info(`Operator signal ${signal.id}: ${input.direction} ${signal.extracted_signal?.asset ?? input.asset}`);
    return signal;
  }

  async runCycle(options: CycleOptions = {}): Promise<LockedRun<CycleReport>> {
    const inbox = this.config.ingestion.inbox;
    // Ingestion appends only, so it runs outside the lock.
    const ingestion = inbox ? await this.ingest([new FileSignalSource(expandHome(inbox), 'inbox')]) : null;
    const result = await withCycleLock(this.lockOptions, () => this.cycle(options.execute ?? true, ingestion));
    if (result.status === 'busy') {
      this.logger.warn(`Cycle skipped: ${busyMessage(result.holderPid)}`);
    }
    return result;
  }

  async runReflection(): Promise<LockedRun<ReflectionReport>> {
    return withCycleLock(this.lockOptions, () => this.reflectUnlocked());
  }

  status(): string {
    const worldview = this.worldviews.load();
    return formatStatusSnapshot({
      asOf: this.now().toISOString(),
      worldview,
      portfolio: this.portfolios.load(),
      maxDrawdown: this.config.risk.maxDrawdown,
      unprocessedSignals: Math.max(0, this.signals.count() - worldview.signal_cursor),
    });
  }

  private async cycle(execute: boolean, ingestion: IngestionResult | null): Promise<CycleReport> {
    try {
      return await this.cycleSteps(execute, ingestion);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      if (failure instanceof StateCorruption) {
        this.raise({ kind: 'state_corruption', severity: 'critical', summary: failure.message });
      }
      this.logger.error('Cycle aborted; prior worldview left in place.', failure);
      this.emit('cycle-aborted', failure);
      throw failure;
    }
  }

  private async cycleSteps(execute: boolean, ingestion: IngestionResult | null): Promise<CycleReport> {
    // Every read that can surface StateCorruption happens before the first write.
    const prior = this.worldviews.load();
    const ledger = this.trustLedger.load();
    const stored = this.portfolios.load();
    const marks = this.marks.getMarks();
    const batch = this.signals.readFrom(prior.signal_cursor);

    const reconciled = reconcilePortfolio(stored, this.trades);
    if (reconciled.replayed > 0) {
      this.logger.warn(`Replayed ${reconciled.replayed} trade(s) missing from the portfolio.`);
    }
    let portfolio = revalue(reconciled.portfolio, marks, this.now());
    this.portfolios.save(portfolio);

    const { worldview: synthesized, report: synthesis } = synthesize(batch.signals, trustLookup(ledger), prior, {
      sectorOf: this.taxonomy.sectorOf,
      settings: this.synthesisSettings,
      signalCursor: batch.nextCursor,
    });
    for (const error of batch.malformed) {
      this.raise({ kind: 'malformed_signal', severity: 'info', summary: error.message, stateId: synthesis.stateId });
      this.emit('malformed-signal', error);
    }

    const limits = this.riskLimits;
    const decisionBatch = decide(synthesized, portfolio, limits, this.proxies);
    if (decisionBatch.halted) {
      const breach: RiskBreach = {
        stateId: synthesis.stateId,
        drawdown: decisionBatch.drawdown,
        maxDrawdown: limits.maxDrawdown,
      };
      this.raise({
        kind: 'risk_breach',
        severity: 'high',
        summary: `Drawdown ${(breach.drawdown * 100).toFixed(1)}% >= ${(limits.maxDrawdown * 100).toFixed(1)}%; new positions halted.`,
        stateId: breach.stateId,
        metadata: { drawdown: breach.drawdown, max_drawdown: breach.maxDrawdown },
      });
      this.emit('risk-breach', breach);
    }

    let trades: Trade[] = [];
    let failures: ExecutionFailure[] = [];
    let worldview = synthesized;
    if (execute) {
      const recorded = await recordDecisions(decisionBatch.decisions, portfolio, {
        tradeLog: this.trades,
        portfolioStore: this.portfolios,
        executor: this.executor,
        timeoutMs: this.config.execution.timeoutMs,
        now: this.now,
        logger: this.logger.child('execution'),
      });
      trades = recorded.trades;
      failures = recorded.failures;
      portfolio = recorded.portfolio;
      for (const failure of failures) {
        this.raise({
          kind: 'execution_failure',
          severity: 'warning',
          summary: failure.message,
          stateId: synthesis.stateId,
          metadata: { decision_id: failure.decisionId, asset: failure.asset },
        });
        this.emit('execution-failure', failure);
      }
      const closed = trades
        .filter((trade) => trade.action === 'close')
        .map((trade) => trade.thesis_id)
        .filter((id): id is string => id !== null);
      worldview = closeTheses(synthesized, closed, this.taxonomy.sectorOf);
    }

    this.worldviews.commit(worldview, this.now());
    this.logger.info(
      `Committed worldview ${worldview.state_id}: ${synthesis.consumed} signal(s), ` +
        `${decisionBatch.decisions.length} decision(s), ${trades.length} trade(s), ${failures.length} failure(s).`
    );

    const reflection = this.config.reflection.runWithCycle ? await this.reflectUnlocked() : null;

    const report: CycleReport = {
      stateId: worldview.state_id,
      executed: execute,
      replayedTrades: reconciled.replayed,
      synthesis,
      decisions: decisionBatch.decisions,
      halted: decisionBatch.halted,
      drawdown: decisionBatch.drawdown,
      skipped: decisionBatch.skipped,
      trades,
      failures,
      malformed: batch.malformed.length,
      ingestion,
      reflection,
    };
    this.emit('cycle-complete', report);
    return report;
  }

  private async reflectUnlocked(): Promise<ReflectionReport> {
    const settled = await settleOutcomes(this.trades, this.outcomes, {
      timeoutMs: this.config.settlement.timeoutMs,
      now: this.now,
      logger: this.logger.child('settlement'),
    });
    const ledger = this.trustLedger.load();
    const processed = new Set(ledger.processed_trade_ids);
    const matured = this.trades.list().filter((trade) => trade.pnl !== null && !processed.has(trade.id));
    const result = reflect(matured, ledger, this.reflectionSettings, this.now());
    if (result.applied.length > 0) {
      this.trustLedger.save(result.ledger);
      this.logger.info(
        `Reflected ${result.applied.length} trade(s) into ${result.updates.length} source trust update(s).`
      );
    }
    return {
      settled: settled.settled.length,
      pending: settled.pending,
      applied: result.applied,
      updates: result.updates,
    };
  }

  private raise(alert: AlertInput): void {
    try {
      this.alerts.record(alert);
    } catch (error) {
      this.logger.error(`Failed to append alert (${alert.kind}): ${errorMessage(error)}`);
    }
  }
}
