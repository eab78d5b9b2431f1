/**
 * Headless Runner
 * CLI for replaying a decision script without the GUI
 */

import { Simulation } from '../core/simulation.js';
import { DEFAULT_CONFIG, ORIGINAL_ECONOMY, mergeConfig } from '../core/shop.js';
import { RunClosedError } from '../core/errors.js';
import { formatWarning } from '../core/warnings.js';
import type { ControllableInputs, ShopConfig, ShopState } from '../core/types.js';
import { applyOverridesToConfig } from '../config/overrides.js';
import { createDatabase } from '../storage/database.js';
import { getRunTotals } from '../storage/analytics.js';
import { createDefaultScript, loadDecisions } from './decisions.js';

interface RunOptions {
  seed: number;
  periods: number;
  decisions: string | null;
  fluctuations: boolean;
  originalEconomy: boolean;
  db: string | null;
  verbose: boolean;
}

function parseArgs(): RunOptions {
  const args = process.argv.slice(2);
  const options: RunOptions = {
    seed: DEFAULT_CONFIG.seed,
    periods: 12,
    decisions: null,
    fluctuations: false,
    originalEconomy: false,
    db: null,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--seed':
        options.seed = parseInt(next, 10);
        i++;
        break;
      case '--periods':
        options.periods = parseInt(next, 10);
        i++;
        break;
      case '--decisions':
        options.decisions = next;
        i++;
        break;
      case '--fluctuations':
        options.fluctuations = true;
        break;
      case '--original-economy':
        options.originalEconomy = true;
        break;
      case '--db':
        options.db = next;
        i++;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        console.log(`
Tailor Shop Simulation Runner

Usage: npm run simulate -- [options]

Options:
  --seed <number>        Random seed (default: ${DEFAULT_CONFIG.seed})
  --periods <number>     Periods to run with the default script (default: 12)
  --decisions <file>     JSON array of per-period inputs to replay
  --fluctuations         Enable material price and demand fluctuations
  --original-economy     Classic economy: interest, storage, benefits, rent,
                         fixed 14-period market series and a 14-period run
  --db <path>            Record the run to a SQLite database
  --verbose, -v          Print applied inputs each period
  --help, -h             Show this help

Examples:
  npm run simulate -- --periods 24
  npm run simulate -- --decisions decisions.json --db runs.db
  npm run simulate -- --original-economy --seed 7
        `);
        process.exit(0);
    }
  }

  return options;
}

function buildConfig(options: RunOptions): ShopConfig {
  let config = applyOverridesToConfig(DEFAULT_CONFIG);
  if (options.originalEconomy) {
    config = mergeConfig(config, ORIGINAL_ECONOMY);
  }
  return mergeConfig(config, {
    seed: options.seed,
    fluctuations: options.fluctuations ? { enabled: true } : {},
  });
}

function formatMoney(value: number): string {
  return Math.round(value).toLocaleString('en-US').padStart(10);
}

function pad(value: number | string, width: number): string {
  return String(value).padStart(width);
}

function printHeader(): void {
  console.log(
    `${pad('Per', 4)} ${pad('Workers', 7)} ${pad('Mach', 4)} ${pad('Made', 5)} ${pad('Demand', 6)} ` +
      `${pad('Sold', 5)} ${pad('Stock', 5)} ${pad('Revenue', 10)} ${pad('Cost', 10)} ${pad('Cash', 10)}`
  );
  console.log('-'.repeat(86));
}

function printRow(state: ShopState): void {
  console.log(
    `${pad(state.period, 4)} ${pad(state.workforce.workers, 7)} ${pad(state.machines.machines, 4)} ` +
      `${pad(state.production.unitsProduced, 5)} ${pad(state.commercial.demand, 6)} ` +
      `${pad(state.commercial.unitsSold, 5)} ${pad(state.inventory.finishedStock, 5)} ` +
      `${formatMoney(state.finance.revenue)} ${formatMoney(state.finance.cost)} ${formatMoney(state.finance.cash)}`
  );
}

function printInputs(inputs: ControllableInputs): void {
  console.log(
    `       price ${inputs.price} | material ${inputs.materialPurchase} | ads ${inputs.advertising} | ` +
      `wage ${inputs.wage} | workers ${inputs.workerDelta >= 0 ? '+' : ''}${inputs.workerDelta} | ` +
      `machines ${inputs.machineDelta >= 0 ? '+' : ''}${inputs.machineDelta} | maintenance ${inputs.maintenance}`
  );
}

function main(): void {
  const options = parseArgs();
  const config = buildConfig(options);
  const script = options.decisions
    ? loadDecisions(options.decisions)
    : createDefaultScript(options.periods);

  console.log('='.repeat(60));
  console.log('Tailor Shop Simulation');
  console.log('='.repeat(60));
  console.log(`Seed: ${config.seed}`);
  console.log(`Periods: ${script.length}${config.maxPeriods !== null ? ` (max ${config.maxPeriods})` : ''}`);
  console.log(`Decisions: ${options.decisions ?? 'default script'}`);
  console.log(`Fluctuations: ${config.fluctuations.enabled ? `Enabled (${config.fluctuations.mode})` : 'Disabled'}`);
  console.log(`Premises: ${config.premises.outlets} outlet(s), ${config.premises.location}`);
  console.log('');

  const sim = Simulation.initialize({}, config);
  const db = options.db ? createDatabase(options.db) : null;
  const runId = db ? db.startRun(config) : null;
  db?.recordPeriod(sim.getState());

  printHeader();
  printRow(sim.getState());

  const startTime = Date.now();

  for (const inputs of script) {
    if (sim.isClosed()) {
      console.log(`\nRun closed at period ${sim.getPeriod()}; remaining decisions ignored`);
      break;
    }

    try {
      const { state, warnings } = sim.advance(inputs);
      printRow(state);
      if (options.verbose) {
        printInputs(sim.getLastInputs() ?? inputs);
      }
      for (const warning of warnings) {
        console.log(`       ! ${formatWarning(warning)}`);
      }
      db?.recordPeriod(state, sim.getLastInputs());
    } catch (error) {
      if (error instanceof RunClosedError) break;
      throw error;
    }
  }

  sim.close();
  const elapsed = Date.now() - startTime;
  const summary = sim.getSummary();

  console.log('');
  console.log('='.repeat(60));
  console.log('Simulation Complete');
  console.log('='.repeat(60));
  console.log(`Periods: ${summary.period}`);
  console.log(`Elapsed time: ${elapsed}ms`);
  console.log(`Cash: ${summary.cash}`);
  console.log(`Cumulative profit: ${summary.cumulativeProfit}`);
  console.log(`Company value: ${summary.companyValue}`);

  if (db && runId !== null) {
    const totals = getRunTotals(db, runId);
    console.log(`Service level: ${(totals.serviceLevel * 100).toFixed(1)}%`);
    console.log(`Recorded as run ${runId} in ${options.db}`);
    db.endRun();
    db.close();
  }

  console.log('');
  console.log('Determinism Check:');
  const hashes = sim.getStateHashes();
  console.log(`  State hashes collected: ${hashes.length}`);
  console.log(`  Final hash: ${hashes[hashes.length - 1]}`);
}

try {
  main();
} catch (error) {
  console.error('Simulation failed:', error);
  process.exit(1);
}
