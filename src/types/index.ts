/**
 * gpo2audit Type Definitions
 * Core interfaces and types shared by the conversion pipeline
 */

// Resource Index Types

/**
 * A single localized string found in a resource (ADML) document
 */
export interface ResourceEntry {
    id: string;
    text: string;
}

/**
 * Flat id -> text lookup built from every resource document.
 * Iteration order is the order in which each id was first seen.
 */
export type ResourceIndex = ReadonlyMap<string, string>;

// Policy Export Types

/** Scope keyword at the head of each setting block */
export type PolicyScope = 'Computer' | 'User';

/** Registry root selected by the scope line */
export type RegistryHive = 'HKLM' | 'HKCU';

/** Actions that remove or create keys rather than assign a value */
export type SkippableAction = 'DELETE' | 'DELETEALLVALUES' | 'CREATEKEYS';

/**
 * A retained line of the policy export, with its 1-based position in the source
 */
export interface RawSettingLine {
    lineNumber: number;
    text: string;
}

/**
 * Classified action line of a setting block
 */
export type SettingAction =
    | { kind: 'assign'; type: string; value: string }
    | { kind: 'skip'; action: SkippableAction }
    | { kind: 'unknown'; raw: string };

/**
 * One registry change, reconstructed from four consecutive retained lines
 */
export interface SettingBlock {
    /** Raw scope line */
    scope: string;
    /** Undefined when the scope line was neither Computer nor User */
    hive?: RegistryHive;
    keyPath: string;
    regKey: string;
    itemName: string;
    description: string;
    action: SettingAction;
    /** Source line number of the scope line */
    startLine: number;
}

// Audit Output Types

export interface AuditRule {
    type: 'REGISTRY_SETTING';
    description: string;
    valueType: string;
    valueData: string;
    regKey: string;
    regItem: string;
}

/**
 * Envelope metadata for the check_type / group_policy tags
 */
export interface AuditMetadata {
    version: string;
    description: string;
}

export interface AuditDocument extends AuditMetadata {
    rules: AuditRule[];
}

// Diagnostics

export type DiagnosticCode =
    | 'UnrecognizedScope'
    | 'SkippedAction'
    | 'UnrecognizedAction'
    | 'TruncatedInput';

export type DiagnosticSeverity = 'info' | 'warning';

/**
 * Non-fatal, per-block finding recorded while parsing
 */
export interface Diagnostic {
    code: DiagnosticCode;
    severity: DiagnosticSeverity;
    message: string;
    /** Source line number where the offending block starts */
    line?: number;
    item?: string;
}

export interface ParseStats {
    blocks: number;
    emitted: number;
    skipped: number;
    unrecognized: number;
}

export interface ParseResult {
    rules: AuditRule[];
    diagnostics: Diagnostic[];
    stats: ParseStats;
}

// Pipeline Types

export interface ConversionOptions {
    /** GPO export produced by the policy-dump utility */
    policyFile: string;
    /** Directory of localized resource documents */
    resourceDir: string;
    /** Destination .audit file */
    outputFile: string;
    version: string;
    description: string;
    /** Replace an existing destination */
    overwrite: boolean;
}

export interface ConversionReport {
    outputFile: string;
    rules: AuditRule[];
    diagnostics: Diagnostic[];
    stats: ParseStats;
    resourceCount: number;
    durationMs: number;
}

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface Logger {
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
    debug(message: string, meta?: Record<string, unknown>): void;
}
