/**
 * Run notifications.
 *
 * One summary per invocation that processed funds, one critical message per
 * invocation aborted before any fund ran. Delivery goes to a webhook when
 * NOTIFY_WEBHOOK_URL is set, otherwise to the log.
 */

import axios from 'axios';
import { FundRunResult } from '../types';
import { createSilentLogger, Logger } from '../utils/logger';

export type SummaryStatus = 'SUCCESS' | 'PARTIAL' | 'FAILURE';

export interface RunSummary {
    date: string;
    status: SummaryStatus;
    subject: string;
    text: string;
}

export interface Notifier {
    sendSummary(summary: RunSummary): Promise<void>;
    sendCriticalFailure(date: string, error: Error, logExcerpt: readonly string[]): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════════

export function summaryStatus(results: readonly FundRunResult[]): SummaryStatus {
    if (results.every(r => r.status === 'SUCCESS')) return 'SUCCESS';
    if (results.every(r => r.status === 'FAILED')) return 'FAILURE';
    return 'PARTIAL';
}

function fundBlock(result: FundRunResult): string {
    const lines = [
        `${result.fund}: ${result.status}`,
        `  Runtime: ${result.runtimeSeconds.toFixed(1)}s`,
        `  Output: ${result.outputPath ?? 'N/A'}${result.versionId ? ` (${result.versionId})` : ''}`,
    ];
    if (result.warnings.length > 0) {
        lines.push('  Warnings:', ...result.warnings.map(w => `    - ${w}`));
    }
    if (result.alerts.length > 0) {
        lines.push('  Reconciliation alerts:', ...result.alerts.map(a => `    - ${a}`));
    }
    if (result.error) {
        lines.push(`  Error: ${result.error}`);
    }
    return lines.join('\n');
}

export function buildRunSummary(date: string, results: readonly FundRunResult[]): RunSummary {
    const status = summaryStatus(results);
    const succeeded = results.filter(r => r.status === 'SUCCESS').length;
    const text = [
        `Fund calculations for ${date}: ${succeeded}/${results.length} succeeded`,
        '',
        ...results.map(fundBlock),
    ].join('\n');

    return {
        date,
        status,
        subject: `[${status}] Fund Calculations ${date}`,
        text,
    };
}

export function buildCriticalMessage(date: string, error: Error, logExcerpt: readonly string[]): RunSummary {
    const text = [
        `Pipeline aborted before any fund was processed.`,
        '',
        `Error (${error.name}): ${error.message}`,
        ...(logExcerpt.length > 0 ? ['', 'Recent log lines:', ...logExcerpt] : []),
    ].join('\n');

    return {
        date,
        status: 'FAILURE',
        subject: `[CRITICAL FAILURE] Fund Calculations ${date}`,
        text,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSPORTS
// ═══════════════════════════════════════════════════════════════════════════════

export type HttpPost = (url: string, body: unknown, config: { timeout: number }) => Promise<unknown>;

const axiosPost: HttpPost = (url, body, config) => axios.post(url, body, config);

export class WebhookNotifier implements Notifier {
    constructor(
        private readonly url: string,
        private readonly logger: Logger = createSilentLogger(),
        private readonly post: HttpPost = axiosPost,
        private readonly timeoutMs: number = 10_000
    ) {}

    private async deliver(message: RunSummary): Promise<void> {
        await this.post(this.url, {
            subject: message.subject,
            status: message.status,
            text: message.text,
        }, { timeout: this.timeoutMs });
        this.logger.info(`[NOTIFY] sent "${message.subject}"`);
    }

    async sendSummary(summary: RunSummary): Promise<void> {
        await this.deliver(summary);
    }

    async sendCriticalFailure(date: string, error: Error, logExcerpt: readonly string[]): Promise<void> {
        await this.deliver(buildCriticalMessage(date, error, logExcerpt));
    }
}

export class LogNotifier implements Notifier {
    constructor(private readonly logger: Logger) {}

    async sendSummary(summary: RunSummary): Promise<void> {
        const level = summary.status === 'SUCCESS' ? 'info' : 'warn';
        this.logger.log(level, `[NOTIFY] ${summary.subject}\n${summary.text}`);
    }

    async sendCriticalFailure(date: string, error: Error, logExcerpt: readonly string[]): Promise<void> {
        const message = buildCriticalMessage(date, error, logExcerpt);
        this.logger.error(`[NOTIFY] ${message.subject}\n${message.text}`);
    }
}

export function createNotifier(webhookUrl: string | null, logger: Logger): Notifier {
    return webhookUrl ? new WebhookNotifier(webhookUrl, logger) : new LogNotifier(logger);
}
