#!/usr/bin/env node
/**
 * Worldview CLI
 *
 * Operator entry point: run cycles, feed signals, inspect state.
 */

import { Command } from 'commander';
import { z } from 'zod';

import { VERSION } from '../index.js';
import { loadConfig, type WorldviewConfig } from '../core/config.js';
import { busyMessage } from '../core/cycle_lock.js';
import { errorMessage } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { WorldviewPipeline, type CycleReport } from '../core/pipeline.js';
import { installConsoleFileMirror } from '../core/unified-logging.js';
import { SIGNAL_DIRECTIONS, SOURCE_TYPES } from '../intel/schema.js';
import { FileSignalSource } from '../intel/sources.js';
import { listSources } from '../memory/trust_ledger.js';

const program = new Command();

function createPipeline(): { config: WorldviewConfig; pipeline: WorldviewPipeline } {
  const config = loadConfig(program.opts<{ config?: string }>().config);
  if (config.logging.file) {
    installConsoleFileMirror({ filePath: config.logging.file });
  }
  const logger = new Logger(config.logging.level, 'worldview');
  return { config, pipeline: new WorldviewPipeline({ config, logger }) };
}

function printCycle(report: CycleReport): void {
  console.log(`State ${report.stateId}${report.executed ? '' : ' (dry run, nothing submitted)'}`);
  console.log('─'.repeat(40));
  if (report.ingestion) {
    const ingested = report.ingestion;
    console.log(
      `Inbox: ${ingested.stored} stored, ${ingested.duplicates} duplicates, ${ingested.malformed.length} malformed`
    );
  }
  const s = report.synthesis;
  console.log(
    `Signals: ${s.consumed} consumed, ${s.usable} usable, ${s.ignored} without extraction, ${report.malformed} malformed`
  );
  console.log(
    `Theses: ${s.formed.length} formed, ${s.activated.length} activated, ${s.invalidated.length} invalidated, ` +
      `${s.flipped.length} flipped, ${s.expired.length} expired`
  );
  if (report.halted) {
    console.log(`Trading HALTED: drawdown ${(report.drawdown * 100).toFixed(1)}%`);
  }
  if (report.decisions.length === 0) {
    console.log('Decisions: none');
  }
  for (const decision of report.decisions) {
    const via = decision.proxied ? ` via ${decision.tradable_asset}` : '';
    console.log(
      `  ${decision.action.padEnd(10)} ${decision.asset}${via} size=${decision.size.toFixed(3)} ` +
        `conf=${decision.confidence.toFixed(3)}`
    );
  }
  for (const skip of report.skipped) {
    console.log(`  skipped    ${skip.asset}: ${skip.reason}`);
  }
  for (const failure of report.failures) {
    console.log(`  FAILED     ${failure.asset}: ${failure.message}`);
  }
  if (report.reflection && report.reflection.applied.length > 0) {
    console.log(`Reflection: ${report.reflection.applied.length} trade(s) applied to trust`);
  }
}

program
  .name('worldview')
  .description('Signal-fusion worldview and risk-gated decision engine')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config.yaml');

program
  .command('cycle')
  .description('Run one synthesis -> decision -> execution cycle')
  .option('--no-execute', 'Compute decisions without submitting them')
  .action(async (rawOptions: unknown) => {
    const options = z.object({ execute: z.boolean().default(true) }).parse(rawOptions);
    const { pipeline } = createPipeline();
    const result = await pipeline.runCycle({ execute: options.execute });
    if (result.status === 'busy') {
      console.log(busyMessage(result.holderPid));
      return;
    }
    printCycle(result.value);
  });

program
  .command('ingest <file>')
  .description('Ingest alpha signals from an NDJSON file')
  .action(async (file: string) => {
    const { pipeline } = createPipeline();
    const result = await pipeline.ingest([new FileSignalSource(file, file)]);
    console.log(
      `Stored ${result.stored}, duplicates ${result.duplicates}, malformed ${result.malformed.length}, ` +
        `gaps ${result.gaps.length}`
    );
  });

const signal = program.command('signal').description('Operator signals');

const humanSignalOptions = z.object({
  source: z.string().min(1),
  type: z.enum(SOURCE_TYPES),
  asset: z.string().min(1),
  direction: z.enum(SIGNAL_DIRECTIONS),
  confidence: z.coerce.number().min(0).max(1),
  note: z.string().optional(),
});

signal
  .command('add')
  .description('Append a human-override signal')
  .requiredOption('--asset <symbol>', 'Asset symbol')
  .requiredOption('--direction <direction>', `One of ${SIGNAL_DIRECTIONS.join(', ')}`)
  .requiredOption('--confidence <value>', 'Confidence in [0, 1]')
  .option('--source <identity>', 'Source identity', 'operator')
  .option('--type <sourceType>', `One of ${SOURCE_TYPES.join(', ')}`, 'website')
  .option('--note <text>', 'Free-text rationale')
  .action(async (rawOptions: unknown) => {
    const parsed = humanSignalOptions.safeParse(rawOptions);
    if (!parsed.success) {
      console.log(
        `Invalid signal: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
      );
      process.exitCode = 1;
      return;
    }
    const { pipeline } = createPipeline();
    const added = pipeline.addHumanSignal({
      source: parsed.data.source,
      sourceType: parsed.data.type,
      asset: parsed.data.asset,
      direction: parsed.data.direction,
      confidence: parsed.data.confidence,
      note: parsed.data.note,
    });
    console.log(`Added ${added.id}`);
  });

program
  .command('reflect')
  .description('Settle matured trades and update source trust')
  .action(async () => {
    const { pipeline } = createPipeline();
    const result = await pipeline.runReflection();
    if (result.status === 'busy') {
      console.log(busyMessage(result.holderPid));
      return;
    }
    const report = result.value;
    console.log(`Settled ${report.settled}, pending ${report.pending}, reflected ${report.applied.length}`);
    for (const update of report.updates) {
      console.log(
        `  ${update.source} (${update.sourceType}) ${update.before.toFixed(3)} -> ${update.after.toFixed(3)} ` +
          `[${update.tradeId} pnl=${update.pnl.toFixed(2)}]`
      );
    }
  });

program
  .command('status')
  .description('Show equity, drawdown, positions and theses')
  .action(async () => {
    const { pipeline } = createPipeline();
    console.log(pipeline.status());
  });

program
  .command('trust')
  .description('List source trust scores')
  .action(async () => {
    const { pipeline } = createPipeline();
    const entries = listSources(pipeline.trustLedger.load()).sort((a, b) => b.weight.trust - a.weight.trust);
    if (entries.length === 0) {
      console.log('No sources in the trust ledger yet.');
      return;
    }
    for (const { sourceType, weight } of entries) {
      console.log(
        `${weight.id.padEnd(24)} ${sourceType.padEnd(9)} trust=${weight.trust.toFixed(3)} ` +
          `n=${weight.sample_count} acc=${(weight.accuracy * 100).toFixed(0)}%`
      );
    }
  });

program
  .command('history')
  .description('Show recent worldview states')
  .option('-n, --limit <count>', 'Number of states', '10')
  .action(async (rawOptions: unknown) => {
    const options = z.object({ limit: z.coerce.number().int().positive() }).parse(rawOptions);
    const { pipeline } = createPipeline();
    for (const entry of pipeline.worldviews.history(options.limit)) {
      const active = entry.snapshot.active_theses.filter((thesis) => thesis.status === 'active').length;
      console.log(
        `#${entry.state_id} ${entry.committed_at} regime=${entry.snapshot.macro_thesis.current_regime} ` +
          `active=${active} beliefs=${entry.snapshot.macro_thesis.key_beliefs.length}`
      );
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`worldview: ${errorMessage(error)}`);
  process.exitCode = 1;
});
