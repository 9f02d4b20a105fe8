#!/usr/bin/env node
/**
 * gpo2audit
 * Main Entry Point
 *
 * Converts a Group Policy registry export into a compliance audit file:
 * 1. Index the localized policy strings (ADML)
 * 2. Parse the export into 4-line setting blocks
 * 3. Render one custom_item per value assignment
 * 4. Write the .audit file (asking before overwriting)
 */
import { logger, logFailure, setLogLevel, enableFileLogging } from './utils/index.js';
import { getConfig } from './config/env.js';
import { parseCliOptions } from './config/cli.js';
import { runConvertCommand } from './commands/index.js';
import { ConversionError } from './core/index.js';

/**
 * Display help message
 */
function displayHelp(): void {
    console.log(`
Usage: gpo2audit <policy-export.txt> [options]

Converts a text export of Group Policy registry settings into an audit file
of REGISTRY_SETTING checks.

Options:
  --input=<file>          Policy export to convert (or pass it as the first argument)
  --adml-dir=<dir>        Directory of .adml resource files used for descriptions
                          (default: ADML_DIR)
  --output=<file>         Destination audit file
                          (default: <OUTPUT_DIR>/<input name>.audit)
  --version-label=<n>     check_type version attribute (default: AUDIT_VERSION or 2)
  --description=<text>    group_policy description (default: input file name)
  --force, -f             Overwrite the destination without asking
  --verbose, -v           Debug logging, lists every skipped block
  --help, -h              Show this help message

Environment Variables:
  ADML_DIR, RESOURCE_EXTENSION, AUDIT_VERSION, AUDIT_DESCRIPTION,
  OUTPUT_DIR, LOG_LEVEL, LOG_FILE (see .env.example)

Examples:
  gpo2audit baseline.txt
  gpo2audit baseline.txt --adml-dir=./PolicyDefinitions/en-US --output=audits/baseline.audit
  gpo2audit --input=baseline.txt --description="Workstation baseline" --force
`);
}

async function main(): Promise<void> {
    const cli = parseCliOptions(process.argv.slice(2));

    if (cli.helpFlag || !cli.inputPath) {
        displayHelp();
        process.exit(cli.helpFlag ? 0 : 1);
    }

    const env = getConfig();
    setLogLevel(cli.verboseFlag ? 'debug' : env.LOG_LEVEL);
    if (env.LOG_FILE) {
        enableFileLogging(env.LOG_FILE);
    }

    const report = await runConvertCommand(cli, env);
    if (!report) {
        process.exitCode = 1;
    }
}

main().catch((error: unknown) => {
    if (error instanceof ConversionError) {
        logFailure(`[${error.code}] ${error.message}`);
    } else {
        logFailure(error instanceof Error ? error.message : String(error));
        logger.debug('Unexpected failure', { error });
    }
    process.exit(1);
});
