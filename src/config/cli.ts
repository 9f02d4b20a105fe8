import * as path from 'node:path';
import { z } from 'zod';
import type { ConversionOptions } from '../types/index.js';
import type { EnvConfig } from './env.js';

export interface CliOptions {
    args: string[];
    /** Policy export (--input=<file> or first positional) */
    inputPath?: string;
    /** Resource directory override (--adml-dir=<dir>) */
    admlDir?: string;
    /** Destination override (--output=<file>) */
    outputPath?: string;
    /** check_type version override (--version-label=<n>) */
    versionLabel?: string;
    /** group_policy description override (--description=<text>) */
    description?: string;
    /** Overwrite an existing destination without asking */
    forceFlag: boolean;
    /** Debug-level logging, surfaces skipped blocks */
    verboseFlag: boolean;
    helpFlag: boolean;
}

function valueOf(args: string[], name: string): string | undefined {
    const arg = args.find(candidate => candidate.startsWith(`--${name}=`));
    return arg ? arg.slice(name.length + 3) : undefined;
}

export function parseCliOptions(args: string[]): CliOptions {
    const positionalInput = args.find(arg => !arg.startsWith('-'));

    return {
        args,
        inputPath: valueOf(args, 'input') ?? positionalInput,
        admlDir: valueOf(args, 'adml-dir'),
        outputPath: valueOf(args, 'output'),
        versionLabel: valueOf(args, 'version-label'),
        description: valueOf(args, 'description'),
        forceFlag: args.includes('--force') || args.includes('-f'),
        verboseFlag: args.includes('--verbose') || args.includes('-v'),
        helpFlag: args.includes('--help') || args.includes('-h'),
    };
}

const RunOptionsSchema = z.object({
    policyFile: z.string().min(1, 'an input policy file is required'),
    resourceDir: z.string().min(1, 'a resource directory is required'),
    outputFile: z.string().min(1),
    version: z.string().regex(/^\d+(\.\d+)*$/, 'version must be numeric, e.g. 2'),
    description: z.string().min(1),
    overwrite: z.boolean(),
});

/**
 * Default destination: <OUTPUT_DIR>/<input name>.audit
 */
export function defaultOutputPath(inputPath: string, outputDir: string): string {
    const base = path.basename(inputPath, path.extname(inputPath));
    return path.join(outputDir, `${base}.audit`);
}

/**
 * Merge CLI flags over environment configuration and validate the result
 * @throws Error listing every invalid option
 */
export function resolveRunOptions(cli: CliOptions, env: EnvConfig): ConversionOptions {
    const inputPath = cli.inputPath ?? '';
    const inputName = inputPath ? path.basename(inputPath, path.extname(inputPath)) : '';

    const candidate = {
        policyFile: inputPath,
        resourceDir: cli.admlDir ?? env.ADML_DIR,
        outputFile: cli.outputPath ?? (inputPath ? defaultOutputPath(inputPath, env.OUTPUT_DIR) : ''),
        version: cli.versionLabel ?? env.AUDIT_VERSION,
        description: cli.description ?? (env.AUDIT_DESCRIPTION || inputName),
        overwrite: cli.forceFlag,
    };

    const parsed = RunOptionsSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
        throw new Error(`Invalid options: ${issues}`);
    }

    return parsed.data;
}
