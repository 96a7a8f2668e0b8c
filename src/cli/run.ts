import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

import type { RunConfig } from '../schema/index.js';
import { createLLMClient } from '../llm/index.js';
import { loadConfigFile, resolveRunConfig } from '../config/index.js';
import type { ConfigOverrides } from '../config/index.js';
import { RUN_DEFAULTS } from '../config/defaults.js';
import { BrowserSession } from '../browser/index.js';
import { CycleOrchestrator, QueryGenerator } from '../core/index.js';
import { RunLogger, formatSummary } from '../report/index.js';
import { errorMessage } from '../utils/clock.js';
import * as log from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  completed: 0,
  fatal: 2,
  startup: 4,
  interrupted: 130,
} as const;

// ── Option parsing ───────────────────────────────────────────

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

async function loadConfig(
  configPath: string,
  overrides: ConfigOverrides,
): Promise<RunConfig> {
  const file = await loadConfigFile(configPath, {
    optional: configPath === RUN_DEFAULTS.CONFIG_FILE,
  });
  return resolveRunConfig({ file, overrides });
}

function reportFatalError(err: unknown, debug: boolean): void {
  log.error(`Fatal error: ${errorMessage(err)}`);
  if (debug && err instanceof Error && err.stack !== undefined) {
    process.stderr.write(err.stack + '\n');
  }
}

// Aborts the controller on the first Ctrl+C; a second one kills the process.
function trapInterrupt(controller: AbortController): () => void {
  const onInterrupt = (): void => {
    log.warn('Interrupt received, stopping after the current step...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  return () => {
    process.off('SIGINT', onInterrupt);
  };
}

function printBanner(config: RunConfig, logFile: string): void {
  log.section('searchloop - AI search automation');
  log.detail(`Cycles:      ${String(config.maxCycles)}`);
  log.detail(`Delay range: ${String(config.minDelay)}-${String(config.maxDelay)}s`);
  log.detail(`Provider:    ${config.provider}`);
  log.detail(`Engine:      ${config.engine.homeUrl}`);
  log.detail(`Log file:    ${logFile}`);
}

// ── Run command ──────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run paced search cycles and log every outcome')
    .option('--cycles <n>', 'Number of search cycles', parseInteger)
    .option('--config <path>', 'Path to config file', RUN_DEFAULTS.CONFIG_FILE)
    .option('--headless', 'Run browser headless')
    .option('--min-delay <seconds>', 'Minimum pause between cycles', parseInteger)
    .option('--max-delay <seconds>', 'Maximum pause between cycles', parseInteger)
    .option('--log-dir <dir>', 'Directory for the CSV run log')
    .action(
      async (opts: {
        cycles?: number;
        config: string;
        headless?: true;
        minDelay?: number;
        maxDelay?: number;
        logDir?: string;
      }) => {
        let config: RunConfig;
        try {
          config = await loadConfig(opts.config, {
            maxCycles: opts.cycles,
            headless: opts.headless,
            minDelay: opts.minDelay,
            maxDelay: opts.maxDelay,
            logDir: opts.logDir,
          });
        } catch (err) {
          process.stderr.write(`Config error: ${errorMessage(err)}\n`);
          process.exitCode = EXIT_CODES.startup;
          return;
        }

        log.setLogLevel(config.debug ? 'debug' : config.logLevel);

        const runLog = new RunLogger(config.logDir);
        const session = new BrowserSession({
          settings: {
            headless: config.headless,
            driverPath: config.driverPath,
            browserChannel: config.browserChannel,
            engine: config.engine,
          },
        });
        const controller = new AbortController();
        const release = trapInterrupt(controller);

        try {
          // 1. Startup: any failure here aborts before the first cycle
          let logFile: string;
          let orchestrator: CycleOrchestrator;
          try {
            const client = createLLMClient(config);
            logFile = await runLog.init(new Date());
            log.info(`CSV logging initialized: ${logFile}`);
            await session.launch();
            orchestrator = new CycleOrchestrator({
              generator: new QueryGenerator({ client }),
              session,
              runLog,
              delay: { minSeconds: config.minDelay, maxSeconds: config.maxDelay },
            });
          } catch (err) {
            reportFatalError(err, config.debug);
            process.exitCode = EXIT_CODES.startup;
            return;
          }

          // 2. Cycles
          printBanner(config, logFile);
          const summary = await orchestrator.run(config.maxCycles, controller.signal);

          // 3. Summary to stderr always
          process.stderr.write(`\n${formatSummary(summary, logFile)}\n`);
          process.exitCode = EXIT_CODES[summary.exitReason];
        } catch (err) {
          reportFatalError(err, config.debug);
          process.exitCode = EXIT_CODES.fatal;
        } finally {
          release();
          await session.close();
          log.info('searchloop terminated');
        }
      },
    );
}

// ── Generate command (no browser) ────────────────────────────

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Print generated queries without opening a browser')
    .option('--count <n>', 'Number of queries', parseInteger, 5)
    .option('--config <path>', 'Path to config file', RUN_DEFAULTS.CONFIG_FILE)
    .action(async (opts: { count: number; config: string }) => {
      let config: RunConfig;
      try {
        config = await loadConfig(opts.config, {});
      } catch (err) {
        process.stderr.write(`Config error: ${errorMessage(err)}\n`);
        process.exitCode = EXIT_CODES.startup;
        return;
      }

      log.setLogLevel(config.debug ? 'debug' : config.logLevel);
      const controller = new AbortController();
      const release = trapInterrupt(controller);

      try {
        const generator = new QueryGenerator({ client: createLLMClient(config) });
        for (let i = 0; i < opts.count && !controller.signal.aborted; i++) {
          const query = await generator.generate(controller.signal);
          process.stdout.write(`${query.text}\t${query.category}\t${query.queryType}\n`);
        }
      } catch (err) {
        if (controller.signal.aborted) {
          process.exitCode = EXIT_CODES.interrupted;
          return;
        }
        reportFatalError(err, config.debug);
        process.exitCode = EXIT_CODES.fatal;
      } finally {
        release();
      }
    });
}
