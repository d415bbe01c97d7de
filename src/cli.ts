#!/usr/bin/env node
import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_CONFIG_PATH, doctorReport, loadSyncConfig, readEnv } from './config.js';
import { loadEnvFiles } from './env.js';
import { createLogger } from './log.js';
import type { Side } from './model.js';
import { createContext, resolveStateDir } from './context.js';
import { SyncStateStore } from './store/syncStateStore.js';
import { acquireLock } from './store/lock.js';
import { Orchestrator } from './sync/orchestrator.js';
import type { SyncOutcome } from './sync/engine.js';
import { createWebhookApp, startWebhookServer } from './webhooks/receiver.js';
import { runDemo } from './demo.js';

loadEnvFiles();

const program = new Command();

program
  .name('tasklink')
  .description('Two-way sync between a Notion planner database and Todoist')
  .version('0.1.0')
  .option('--state-dir <dir>', 'Override state dir (default: .tasklink or TASKLINK_STATE_DIR)')
  .option('--config <path>', `Sync config file (default: ${DEFAULT_CONFIG_PATH} or TASKLINK_CONFIG_PATH)`);

type Format = 'pretty' | 'json';

function parseFormat(v: string): Format {
  if (v === 'pretty' || v === 'json') return v;
  throw new InvalidArgumentError('expected pretty or json');
}

function parsePositive(v: string): number {
  const n = Number(v);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('expected a positive number');
  return n;
}

function parseSide(v: string): Side {
  const s = v.toLowerCase();
  if (s === 'a' || s === 'planner') return 'A';
  if (s === 'b' || s === 'tasks') return 'B';
  throw new InvalidArgumentError('expected planner|tasks (or a|b)');
}

interface GlobalOptions {
  stateDir?: string;
  config?: string;
}

function setup() {
  const env = readEnv();
  const global = program.opts<GlobalOptions>();
  const logger = createLogger(env.TASKLINK_LOG_LEVEL ?? 'info');
  const config = loadSyncConfig(global.config ?? env.TASKLINK_CONFIG_PATH ?? DEFAULT_CONFIG_PATH);
  const ctx = createContext({ env, config, logger, stateDir: global.stateDir });
  return { env, logger, ctx };
}

function describeOutcome(o: SyncOutcome): string {
  switch (o.kind) {
    case 'created':
    case 'unchanged':
      return `${o.kind} ${o.direction} A:${o.aId} B:${o.bId}`;
    case 'updated':
      return `updated ${o.direction} A:${o.aId} B:${o.bId} [${o.changes.join(', ')}]`;
    case 'deferred':
      return `deferred ${o.direction} ${o.id}: ${o.reason}`;
    case 'skipped':
      return `skipped ${o.direction} ${o.id}: ${o.reason}`;
    case 'failed':
      return `failed ${o.direction} ${o.id} at ${o.stage}: ${o.error}`;
  }
}

function countByKind(outcomes: SyncOutcome[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const o of outcomes) counts[o.kind] = (counts[o.kind] ?? 0) + 1;
  return counts;
}

async function withLock<T>(dir: string, fn: () => Promise<T>): Promise<T> {
  const lock = await acquireLock(dir, 'orchestrator.lock');
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(() => {
    const env = readEnv();
    const report = doctorReport(env);
    console.log('tasklink doctor');

    const configPath = program.opts<GlobalOptions>().config ?? env.TASKLINK_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
    try {
      loadSyncConfig(configPath);
      console.log(`sync config: ${configPath} (ok)`);
    } catch (e) {
      console.log(`sync config: ${e instanceof Error ? e.message : String(e)}`);
      process.exitCode = 2;
    }

    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
      process.exitCode = 2;
    } else {
      console.log('\nNo missing env vars detected.');
    }

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }
  });

program
  .command('sweep')
  .description('Reconcile every planner page edited within the window')
  .option('--window <minutes>', 'Look-back window in minutes (or TASKLINK_SWEEP_WINDOW_MINUTES)', parsePositive)
  .option('--format <format>', 'Output format: pretty|json', parseFormat, 'pretty')
  .action(async (opts: { window?: number; format: Format }) => {
    const { env, ctx } = setup();
    const window = opts.window ?? env.TASKLINK_SWEEP_WINDOW_MINUTES ?? 10;
    const orchestrator = new Orchestrator(ctx);

    const report = await withLock(ctx.store.getDir(), () => orchestrator.runFullSweep(window));

    if (opts.format === 'json') {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    console.log('tasklink sweep');
    console.log(`window: ${report.windowMinutes}m (since ${report.since})`);
    console.log(`scanned: ${report.scanned}`);
    for (const [kind, n] of Object.entries(countByKind(report.outcomes))) console.log(`- ${kind}: ${n}`);
    for (const o of report.outcomes) if (o.kind !== 'unchanged') console.log(`  ${describeOutcome(o)}`);
    if (report.outcomes.some((o) => o.kind === 'failed')) process.exitCode = 1;
  });

program
  .command('sync-task')
  .description('Reconcile a single task')
  .argument('<side>', 'planner|tasks', parseSide)
  .argument('<id>', 'task id on that side')
  .action(async (side: Side, id: string) => {
    const { ctx } = setup();
    const orchestrator = new Orchestrator(ctx);
    const outcome = await withLock(ctx.store.getDir(), () => orchestrator.engine.sync(side, id));
    console.log(describeOutcome(outcome));
    if (outcome.kind === 'failed') process.exitCode = 1;
  });

program
  .command('serve')
  .description('Run the orchestrator with webhook endpoints and a periodic sweep')
  .option('--port <port>', 'Webhook port (or TASKLINK_WEBHOOK_PORT, default 8080)', parsePositive)
  .option('--poll <minutes>', 'Sweep interval in minutes (or TASKLINK_POLL_INTERVAL_MINUTES)', parsePositive)
  .action(async (opts: { port?: number; poll?: number }) => {
    const { env, logger, ctx } = setup();
    const pollIntervalMinutes = opts.poll ?? env.TASKLINK_POLL_INTERVAL_MINUTES;
    const orchestrator = new Orchestrator(ctx, {
      pollIntervalMinutes,
      sweepWindowMinutes: env.TASKLINK_SWEEP_WINDOW_MINUTES,
    });
    await orchestrator.start();

    const app = createWebhookApp({
      orchestrator,
      plannerSecret: env.TASKLINK_PLANNER_WEBHOOK_SECRET,
      tasksSecret: env.TASKLINK_TASKS_WEBHOOK_SECRET,
      logger,
    });
    const server = startWebhookServer(app, opts.port ?? env.TASKLINK_WEBHOOK_PORT ?? 8080, logger);

    const shutdown = (signal: string) => {
      logger.info(`${signal} received; shutting down`);
      Promise.all([server.close(), orchestrator.stop()]).then(
        () => process.exit(0),
        (e: unknown) => {
          logger.error('shutdown failed', e);
          process.exit(1);
        },
      );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

program
  .command('status')
  .description('Show sync state: pairings, recent syncs and stale rows')
  .option('--stale-hours <hours>', 'Report rows not synced for this many hours', parsePositive, 24)
  .option('--format <format>', 'Output format: pretty|json', parseFormat, 'pretty')
  .action(async (opts: { staleHours: number; format: Format }) => {
    const env = readEnv();
    const store = new SyncStateStore(resolveStateDir(env, program.opts<GlobalOptions>().stateDir));

    const all = await store.listAll();
    const stale = await store.listStale(opts.staleHours * 3_600_000);
    const conflicts = all.filter((r) => r.conflictCount > 0);

    if (opts.format === 'json') {
      console.log(JSON.stringify({ stateDir: store.getDir(), count: all.length, recent: all.slice(0, 10), stale, conflicts }, null, 2));
      return;
    }
    console.log('tasklink status');
    console.log(`stateDir: ${store.getDir()}`);
    console.log(`pairings: ${all.length}`);
    console.log('\nrecent:');
    for (const r of all.slice(0, 10)) {
      console.log(`- A:${r.sideAId} <-> B:${r.sideBId} ${r.lastSyncDirection} @ ${r.lastSyncedAt}`);
    }
    console.log(`\nstale (> ${opts.staleHours}h): ${stale.length}`);
    for (const r of stale) console.log(`- A:${r.sideAId} last synced ${r.lastSyncedAt}`);
    if (conflicts.length) {
      console.log(`\nconflicts recorded on ${conflicts.length} pairing(s)`);
      for (const r of conflicts) console.log(`- A:${r.sideAId}: ${r.conflictCount}`);
    }
  });

program
  .command('rebuild-state')
  .description('Recreate missing pairings from back-reference comments on Todoist tasks')
  .action(async () => {
    const { ctx } = setup();
    const orchestrator = new Orchestrator(ctx);
    const report = await withLock(ctx.store.getDir(), () => orchestrator.engine.rebuildState());
    console.log('tasklink rebuild-state');
    console.log(`scanned: ${report.scanned}`);
    console.log(`linked: ${report.linked}`);
    console.log(`alreadyLinked: ${report.alreadyLinked}`);
    console.log(`unannotated: ${report.unannotated}`);
  });

program
  .command('demo')
  .description('Run a round trip against in-memory planner and task manager')
  .option('--format <format>', 'Output format: pretty|json', parseFormat, 'pretty')
  .action(async (opts: { format: Format }) => {
    const env = readEnv();
    const logger = createLogger(env.TASKLINK_LOG_LEVEL ?? 'warn');
    const dir = await mkdtemp(path.join(os.tmpdir(), 'tasklink-demo-'));
    const report = await runDemo(dir, logger);

    if (opts.format === 'json') {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    console.log('tasklink demo');
    console.log(`stateDir: ${dir}`);
    console.log('\nsweep:');
    for (const o of report.sweep.outcomes) console.log(`- ${describeOutcome(o)}`);
    console.log('\nafter editing on the task manager:');
    for (const o of report.followUp) console.log(`- ${describeOutcome(o)}`);
    console.log(`\npairings: ${report.states.length}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
