/**
 * Core Module Index
 */

export { GpoAuditConverter } from './GpoAuditConverter.js';
export type { ConverterOptions } from './GpoAuditConverter.js';
export {
    ResourceIndexBuilder,
    resolveDescription,
    DEFAULT_RESOURCE_EXTENSION,
} from './ResourceIndexBuilder.js';
export {
    SettingBlockParser,
    ParserState,
    retainSettingLines,
    classifyAction,
} from './SettingBlockParser.js';
export type { FeedResult } from './SettingBlockParser.js';
export { AuditEmitter, renderOpening, renderRule, renderClosing } from './AuditEmitter.js';
export type { WriteOptions } from './AuditEmitter.js';
export {
    ConversionError,
    MissingDirectoryError,
    NoResourceFilesError,
    ResourceParseError,
    InputReadError,
    WriteError,
} from './errors.js';
export type { ConversionErrorCode } from './errors.js';
