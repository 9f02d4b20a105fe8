/**
 * Utils Module Index
 */

export {
    logger,
    logSection,
    logSuccess,
    logFailure,
    logWarning,
    enableFileLogging,
    setLogLevel,
} from './logger.js';

export { decodeText, detectEncoding } from './encoding.js';
export type { TextEncodingName } from './encoding.js';
