/**
 * Commands Module
 */

export { runConvertCommand, confirmOverwrite } from './ConvertCommand.js';
