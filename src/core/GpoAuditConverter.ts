/**
 * GPO Audit Converter
 *
 * Runs the conversion pipeline in strict sequence:
 * 1. Build the resource index from the ADML directory
 * 2. Read and decode the policy export
 * 3. Parse setting blocks into audit rules
 * 4. Render the audit document and write it
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ConversionOptions, ConversionReport, Logger, ParseResult, ResourceIndex } from '../types/index.js';
import { decodeText } from '../utils/encoding.js';
import { AuditEmitter } from './AuditEmitter.js';
import { InputReadError } from './errors.js';
import { DEFAULT_RESOURCE_EXTENSION, ResourceIndexBuilder } from './ResourceIndexBuilder.js';
import { SettingBlockParser } from './SettingBlockParser.js';

export interface ConverterOptions {
    /** File extension of resource documents (default: .adml) */
    resourceExtension?: string;
}

export class GpoAuditConverter {
    private readonly logger: Logger;
    private readonly builder: ResourceIndexBuilder;

    constructor(logger: Logger, options: ConverterOptions = {}) {
        this.logger = logger;
        this.builder = new ResourceIndexBuilder(logger, options.resourceExtension ?? DEFAULT_RESOURCE_EXTENSION);
    }

    async convert(options: ConversionOptions): Promise<ConversionReport> {
        const startTime = Date.now();

        const index = await this.builder.build(options.resourceDir);
        const text = await this.readPolicyFile(options.policyFile);
        const { rules, diagnostics, stats } = this.parse(text, index);

        const emitter = new AuditEmitter(this.logger);
        const outputFile = await emitter.write(
            { version: options.version, description: options.description, rules },
            options.outputFile,
            { overwrite: options.overwrite }
        );

        return {
            outputFile,
            rules,
            diagnostics,
            stats,
            resourceCount: index.size,
            durationMs: Date.now() - startTime,
        };
    }

    parse(text: string, index: ResourceIndex): ParseResult {
        const parser = new SettingBlockParser(index, this.logger);
        const result = parser.parse(text);
        this.logger.debug(
            `Parsed ${result.stats.blocks} block(s): ${result.stats.emitted} emitted, ` +
            `${result.stats.skipped} skipped, ${result.stats.unrecognized} unrecognized`
        );
        return result;
    }

    private async readPolicyFile(policyFile: string): Promise<string> {
        const target = path.resolve(policyFile);
        try {
            const buffer = await fs.readFile(target);
            return decodeText(buffer);
        } catch (error) {
            throw new InputReadError(target, error);
        }
    }
}

export default GpoAuditConverter;
