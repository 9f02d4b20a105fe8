/**
 * Setting-Block Parser
 *
 * Reads the policy-dump export as a stream of retained lines and groups
 * them into fixed 4-line blocks:
 *
 *   Computer | User          scope, selects HKLM or HKCU
 *   <key path>               relative registry key
 *   <item name>              registry value name
 *   <TYPE>:<VALUE> | DELETE | DELETEALLVALUES | CREATEKEYS
 *
 * Each completed block is classified as emit (one AuditRule) or skip (a
 * Diagnostic). The state always returns to AwaitScope after the action
 * line, whatever the outcome.
 */

import type {
    AuditRule,
    Diagnostic,
    Logger,
    ParseResult,
    ParseStats,
    PolicyScope,
    RawSettingLine,
    RegistryHive,
    ResourceIndex,
    SettingAction,
    SettingBlock,
    SkippableAction,
} from '../types/index.js';
import { resolveDescription } from './ResourceIndexBuilder.js';

export enum ParserState {
    AwaitScope = 'AwaitScope',
    AwaitKey = 'AwaitKey',
    AwaitItem = 'AwaitItem',
    AwaitAction = 'AwaitAction',
}

const HIVES: Record<PolicyScope, RegistryHive> = {
    Computer: 'HKLM',
    User: 'HKCU',
};

const SKIPPABLE_ACTIONS: ReadonlySet<string> = new Set<SkippableAction>([
    'DELETE',
    'DELETEALLVALUES',
    'CREATEKEYS',
]);

/**
 * Result of feeding one line to the parser
 */
export type FeedResult =
    | { kind: 'pending' }
    | { kind: 'rule'; block: SettingBlock; rule: AuditRule }
    | { kind: 'dropped'; block: SettingBlock; diagnostic: Diagnostic };

/**
 * Fields collected for the block in progress
 */
interface BlockAccumulator {
    startLine: number;
    scope: string;
    hive?: RegistryHive;
    keyPath: string;
    regKey: string;
    itemName: string;
    description: string;
    /** Number of lines consumed so far */
    consumed: number;
}

function emptyAccumulator(): BlockAccumulator {
    return {
        startLine: 0,
        scope: '',
        keyPath: '',
        regKey: '',
        itemName: '',
        description: '',
        consumed: 0,
    };
}

function isPolicyScope(value: string): value is PolicyScope {
    return value === 'Computer' || value === 'User';
}

function isSkippableAction(value: string): value is SkippableAction {
    return SKIPPABLE_ACTIONS.has(value);
}

/**
 * Drop blank lines and `;` comments, keeping source line numbers
 */
export function retainSettingLines(text: string): RawSettingLine[] {
    const retained: RawSettingLine[] = [];
    const lines = text.split('\n');

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i];
        if (line.trim() === '' || line.startsWith(';')) continue;
        retained.push({ lineNumber: i + 1, text: line });
    }

    return retained;
}

/**
 * Classify the fourth line of a block
 */
export function classifyAction(line: string): SettingAction {
    const colon = line.indexOf(':');
    if (colon !== -1) {
        return { kind: 'assign', type: line.slice(0, colon), value: line.slice(colon + 1) };
    }
    if (isSkippableAction(line)) {
        return { kind: 'skip', action: line };
    }
    return { kind: 'unknown', raw: line };
}

export class SettingBlockParser {
    private readonly index: ResourceIndex;
    private readonly logger: Logger;
    private state: ParserState = ParserState.AwaitScope;
    private block: BlockAccumulator = emptyAccumulator();

    constructor(index: ResourceIndex, logger: Logger) {
        this.index = index;
        this.logger = logger;
    }

    get currentState(): ParserState {
        return this.state;
    }

    /**
     * Parse a whole export and collect rules, diagnostics and counts
     */
    parse(text: string): ParseResult {
        this.reset();

        const rules: AuditRule[] = [];
        const diagnostics: Diagnostic[] = [];
        const stats: ParseStats = { blocks: 0, emitted: 0, skipped: 0, unrecognized: 0 };

        for (const line of retainSettingLines(text)) {
            const result = this.feed(line);
            if (result.kind === 'pending') continue;

            stats.blocks++;
            if (result.kind === 'rule') {
                rules.push(result.rule);
                stats.emitted++;
                continue;
            }

            diagnostics.push(result.diagnostic);
            if (result.diagnostic.code === 'SkippedAction') {
                stats.skipped++;
            } else {
                stats.unrecognized++;
            }
        }

        const trailing = this.finish();
        if (trailing) {
            diagnostics.push(trailing);
        }

        return { rules, diagnostics, stats };
    }

    /**
     * Advance the state machine by one retained line
     */
    feed(line: RawSettingLine): FeedResult {
        const value = line.text;
        this.block.consumed++;

        switch (this.state) {
            case ParserState.AwaitScope:
                this.block.startLine = line.lineNumber;
                this.block.scope = value;
                this.block.hive = isPolicyScope(value) ? HIVES[value] : undefined;
                this.state = ParserState.AwaitKey;
                return { kind: 'pending' };

            case ParserState.AwaitKey:
                this.block.keyPath = value;
                this.block.regKey = `${this.block.hive ?? ''}\\${value}`;
                this.state = ParserState.AwaitItem;
                return { kind: 'pending' };

            case ParserState.AwaitItem:
                this.block.itemName = value;
                this.block.description = resolveDescription(this.index, value) ?? value;
                this.state = ParserState.AwaitAction;
                return { kind: 'pending' };

            case ParserState.AwaitAction: {
                const block = this.complete(classifyAction(value));
                this.reset();
                return this.route(block);
            }
        }
    }

    /**
     * Close the stream. Returns a TruncatedInput diagnostic when the input
     * ended in the middle of a block; the partial block is discarded.
     */
    finish(): Diagnostic | null {
        if (this.state === ParserState.AwaitScope) {
            return null;
        }

        const diagnostic: Diagnostic = {
            code: 'TruncatedInput',
            severity: 'warning',
            message: `Input ended mid-block: ${this.block.consumed} of 4 lines read, partial block dropped`,
            line: this.block.startLine,
            item: this.block.itemName || undefined,
        };
        this.logger.warn(diagnostic.message, { line: diagnostic.line });
        this.reset();
        return diagnostic;
    }

    reset(): void {
        this.state = ParserState.AwaitScope;
        this.block = emptyAccumulator();
    }

    private complete(action: SettingAction): SettingBlock {
        const { scope, hive, keyPath, regKey, itemName, description, startLine } = this.block;
        return { scope, hive, keyPath, regKey, itemName, description, action, startLine };
    }

    private route(block: SettingBlock): FeedResult {
        if (block.hive === undefined) {
            return this.drop(block, {
                code: 'UnrecognizedScope',
                severity: 'warning',
                message: `Unrecognized scope "${block.scope}" for ${block.itemName}, expected Computer or User; block dropped`,
                line: block.startLine,
                item: block.itemName,
            });
        }

        const action = block.action;
        switch (action.kind) {
            case 'assign':
                return { kind: 'rule', block, rule: toAuditRule(block, action.type, action.value) };

            case 'skip':
                return this.drop(block, {
                    code: 'SkippedAction',
                    severity: 'info',
                    message: `Skipping ${block.itemName}: ${action.action} actions are not audited`,
                    line: block.startLine,
                    item: block.itemName,
                });

            case 'unknown':
                return this.drop(block, {
                    code: 'UnrecognizedAction',
                    severity: 'warning',
                    message: `Unrecognized action "${action.raw}" for ${block.itemName}; block dropped`,
                    line: block.startLine,
                    item: block.itemName,
                });
        }
    }

    private drop(block: SettingBlock, diagnostic: Diagnostic): FeedResult {
        if (diagnostic.severity === 'info') {
            this.logger.debug(diagnostic.message, { line: diagnostic.line });
        } else {
            this.logger.warn(diagnostic.message, { line: diagnostic.line });
        }
        return { kind: 'dropped', block, diagnostic };
    }
}

function toAuditRule(block: SettingBlock, type: string, value: string): AuditRule {
    return {
        type: 'REGISTRY_SETTING',
        description: block.description,
        valueType: `POLICY_${type}`,
        valueData: type === 'SZ' ? `"${value}"` : value,
        regKey: block.regKey,
        regItem: block.itemName,
    };
}

export default SettingBlockParser;
