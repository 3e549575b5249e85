import 'dotenv/config';

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { DefaultConfig, loadEnvConfig } from './config/default';
import { runPipeline } from './runtime/pipeline';
import { ExitCode } from './types';
import { ConfigError } from './types/errors';
import { resolveBusinessDate } from './utils/businessDate';
import logger from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// CLI
// ═══════════════════════════════════════════════════════════════════════════════

interface CliOptions {
    date: string;
    fund?: string;
    configDir?: string;
    outputDir?: string;
    logDir?: string;
}

function parseDateOption(value: string): string {
    const date = resolveBusinessDate(value);
    if (date === null) {
        throw new InvalidArgumentError('Expected YYYYMMDD or "today".');
    }
    return date;
}

export function buildProgram(): Command {
    return new Command()
        .name('fund-weights')
        .description('Calculate, validate, reconcile and store daily fund component weights')
        .option('--date <date>', 'business date (YYYYMMDD or "today")', parseDateOption, 'today')
        .option('--fund <id>', 'run a single fund instead of every active fund')
        .option('--config-dir <dir>', 'directory holding funds.yaml and validation_rules.yaml')
        .option('--output-dir <dir>', 'root of the versioned output store')
        .option('--log-dir <dir>', 'directory for run log files')
        .exitOverride();
}

/**
 * Parse arguments, run the pipeline once and return its exit code.
 * Argument and environment errors exit 2; --help exits 0.
 */
export async function main(argv: readonly string[] = process.argv): Promise<ExitCode> {
    const program = buildProgram();
    try {
        program.parse([...argv]);
    } catch (err) {
        if (err instanceof CommanderError) {
            return err.exitCode === 0 ? 0 : 2;
        }
        throw err;
    }

    const opts = program.opts<CliOptions>();
    // the default 'today' is not passed through the option parser
    const date = resolveBusinessDate(opts.date);
    if (date === null) {
        logger.error(`[CLI] invalid --date "${opts.date}"`);
        return 2;
    }

    let env: DefaultConfig;
    try {
        env = loadEnvConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            logger.error(err.message);
            return 2;
        }
        throw err;
    }

    const outcome = await runPipeline({
        date,
        fund: opts.fund,
        env: {
            ...env,
            CONFIG_DIR: opts.configDir ?? env.CONFIG_DIR,
            OUTPUT_DIR: opts.outputDir ?? env.OUTPUT_DIR,
            LOG_DIR: opts.logDir ?? env.LOG_DIR,
        },
    });
    return outcome.exitCode;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS ENTRY
// ═══════════════════════════════════════════════════════════════════════════════

if (require.main === module) {
    process.on('unhandledRejection', (reason) => {
        logger.error(`[FATAL] Unhandled rejection: ${reason instanceof Error ? reason.stack ?? reason.message : String(reason)}`);
        process.exitCode = 2;
    });

    main()
        .then(code => {
            process.exitCode = code;
        })
        .catch((err: unknown) => {
            logger.error(`[FATAL] ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
            process.exitCode = 2;
        });
}
