#!/usr/bin/env node
import 'dotenv/config';

import * as fs from 'fs';
import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { AppContext, bootstrap } from './bootstrap';
import { ConfigError, loadBotConfig } from './config/botConfig';
import { ENGINE_CONSTANTS } from './config/constants';
import { allCriticalPassed, formatDoctorReport, runDoctor } from './services/doctor';
import { exportToCsv } from './services/exporter';
import { generateDailyReport } from './services/reporter';
import { formatScanResults, scanAllSymbols } from './services/scanner';
import logger, { configureLogger } from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// LOCKFILE (one trading process per working directory)
// ═══════════════════════════════════════════════════════════════════════════════
const LOCKFILE_PATH = path.join(process.cwd(), '.spread-pilot.lock');

function isProcessRunning(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch {
        return false;
    }
}

function acquireProcessLock(): boolean {
    try {
        if (fs.existsSync(LOCKFILE_PATH)) {
            const existingPid = parseInt(fs.readFileSync(LOCKFILE_PATH, 'utf8').trim(), 10);
            if (!isNaN(existingPid) && isProcessRunning(existingPid)) {
                return false;
            }
            console.log(`[STARTUP] Removing stale lockfile (PID ${existingPid} not running)`);
            fs.unlinkSync(LOCKFILE_PATH);
        }
        fs.writeFileSync(LOCKFILE_PATH, process.pid.toString(), 'utf8');
        return true;
    } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(`[STARTUP] Failed to acquire process lock: ${msg}`);
        return false;
    }
}

function releaseProcessLock(): void {
    try {
        if (fs.existsSync(LOCKFILE_PATH)) {
            const storedPid = parseInt(fs.readFileSync(LOCKFILE_PATH, 'utf8').trim(), 10);
            if (storedPid === process.pid) {
                fs.unlinkSync(LOCKFILE_PATH);
            }
        }
    } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(`[SHUTDOWN] Could not release process lock: ${msg}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// APP + SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

function createApp(): AppContext {
    const config = loadBotConfig();
    const app = bootstrap(config);
    configureLogger(config.logging, app.supabase);

    logger.info(
        `[STARTUP] trading_disabled=${config.tradingDisabled} account_size=${config.accountSize} ` +
        `underlyings=${config.underlyings.join(',')} tz=${config.timezone}`
    );
    if (config.tradingDisabled) {
        logger.warn('[STARTUP] TRADING_DISABLED=true - no orders will reach the broker');
    }
    return app;
}

/**
 * First SIGINT/SIGTERM asks the scheduler to stop (final management pass and
 * session close still run). A second one exits immediately.
 */
function attachShutdownHandlers(app: AppContext): void {
    let signalled = false;
    const onSignal = (signal: string): void => {
        if (signalled) {
            console.log(`[SHUTDOWN] ${signal} received again - exiting now`);
            releaseProcessLock();
            process.exit(1);
        }
        signalled = true;
        console.log(`[SHUTDOWN] Received ${signal} - stopping session gracefully...`);
        app.scheduler.stop();
    };
    process.on('SIGINT', () => onSignal('SIGINT'));
    process.on('SIGTERM', () => onSignal('SIGTERM'));
    process.on('exit', () => releaseProcessLock());
}

async function withTradingProcess(run: (app: AppContext) => Promise<void>): Promise<void> {
    if (!acquireProcessLock()) {
        console.error('[STARTUP] Another instance is already running in this directory.');
        console.error(`[STARTUP] Stop it or remove ${LOCKFILE_PATH} manually.`);
        process.exitCode = 1;
        return;
    }
    try {
        const app = createApp();
        attachShutdownHandlers(app);
        await run(app);
    } finally {
        releaseProcessLock();
    }
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

const program = new Command();

program
    .name('spread-pilot')
    .description('Put credit spread decision engine')
    .version('0.1.0');

program
    .command('run')
    .description('Run a bounded trading session (management + entries inside the entry window)')
    .option('--session <minutes>', 'Session length in minutes', parsePositiveInt, 120)
    .action(async (opts: { session: number }) => {
        await withTradingProcess(async app => {
            const summary = await app.scheduler.runSession(opts.session);
            if (!summary) {
                process.exitCode = 1;
            }
        });
    });

program
    .command('manage')
    .description('Manage open trades only (no entries) until interrupted')
    .action(async () => {
        await withTradingProcess(async app => {
            const summary = await app.scheduler.runManageOnly();
            if (!summary) {
                process.exitCode = 1;
            }
        });
    });

program
    .command('scan')
    .description('Scan underlyings for candidates and print them (no orders)')
    .action(async () => {
        const app = createApp();
        const connected = await app.gateway.connect(
            ENGINE_CONSTANTS.CONNECT_RETRIES,
            ENGINE_CONSTANTS.CONNECT_RETRY_DELAY_MS
        );
        if (!connected) {
            console.error('Failed to connect to broker gateway');
            process.exitCode = 1;
            return;
        }
        try {
            const results = await scanAllSymbols(app.config, app.generator);
            console.log(formatScanResults(results));
        } finally {
            await app.gateway.disconnect();
        }
    });

program
    .command('report')
    .description("Print today's P&L and positions report")
    .action(async () => {
        const app = createApp();
        console.log(await generateDailyReport(app.config, app.store, app.clock));
    });

program
    .command('export')
    .description('Export trades, orders and fills to CSV')
    .requiredOption('--csv <path>', 'Base CSV path; writes <path>_trades.csv, _orders.csv, _fills.csv')
    .action(async (opts: { csv: string }) => {
        const app = createApp();
        const files = await exportToCsv(app.store, opts.csv);
        console.log('Exported to:');
        console.log(`  - ${files.tradesFile}`);
        console.log(`  - ${files.ordersFile}`);
        console.log(`  - ${files.fillsFile}`);
    });

program
    .command('doctor')
    .description('Check gateway connectivity, account, market data and Greeks')
    .action(async () => {
        const app = createApp();
        const report = await runDoctor(app.config, app.gateway);
        console.log(formatDoctorReport(report));
        if (!allCriticalPassed(report)) {
            process.exitCode = 1;
        }
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    if (err instanceof ConfigError) {
        console.error(`[CONFIG] ${err.message}`);
    } else {
        const msg = err instanceof Error ? err.message : String(err);
        logger.error(`[FATAL] ${msg}`);
        console.error(`[FATAL] ${msg}`);
    }
    releaseProcessLock();
    process.exitCode = 1;
});
