/**
 * Convert Command
 * CLI glue around the conversion pipeline: existence checks, overwrite
 * confirmation and the end-of-run summary
 */

import prompts from 'prompts';
import * as fs from 'node:fs';
import { logger, logSection, logSuccess, logWarning } from '../utils/logger.js';
import { resolveRunOptions, type CliOptions } from '../config/cli.js';
import type { EnvConfig } from '../config/env.js';
import { GpoAuditConverter } from '../core/index.js';
import type { ConversionReport } from '../types/index.js';

/**
 * Ask before replacing an existing audit file. Without a terminal there is
 * nobody to ask, so the answer is no.
 */
export async function confirmOverwrite(
    destination: string,
    interactive: boolean = Boolean(process.stdin.isTTY)
): Promise<boolean> {
    if (!interactive) {
        logWarning(`${destination} already exists; re-run with --force to overwrite it`);
        return false;
    }

    const response = await prompts({
        type: 'confirm',
        name: 'overwrite',
        message: `${destination} already exists. Overwrite it?`,
        initial: false,
    });

    return response.overwrite === true;
}

/**
 * Run one conversion
 * @returns The report, or null when the user declined to overwrite
 * @throws ConversionError on any fatal pipeline failure
 */
export async function runConvertCommand(cli: CliOptions, env: EnvConfig): Promise<ConversionReport | null> {
    let options = resolveRunOptions(cli, env);

    if (!fs.existsSync(options.policyFile)) {
        throw new Error(`Policy file not found: ${options.policyFile}`);
    }

    if (!options.overwrite && fs.existsSync(options.outputFile)) {
        const confirmed = await confirmOverwrite(options.outputFile);
        if (!confirmed) {
            logWarning('Conversion cancelled, existing audit file left untouched');
            return null;
        }
        options = { ...options, overwrite: true };
    }

    logSection('GPO to Audit Conversion');
    logger.info(`Policy file: ${options.policyFile}`);
    logger.info(`Resource directory: ${options.resourceDir}`);

    const converter = new GpoAuditConverter(logger, { resourceExtension: env.RESOURCE_EXTENSION });
    const report = await converter.convert(options);

    logSummary(report);
    return report;
}

function logSummary(report: ConversionReport): void {
    const truncated = report.diagnostics.filter(d => d.code === 'TruncatedInput').length;

    logSuccess(`${report.stats.emitted} audit rule(s) written to ${report.outputFile}`);
    logger.info(
        `Blocks: ${report.stats.blocks}, skipped: ${report.stats.skipped}, ` +
        `unrecognized: ${report.stats.unrecognized}, truncated: ${truncated}`
    );
    logger.info(`Resource strings indexed: ${report.resourceCount}, duration: ${report.durationMs}ms`);
}
