/**
 * WASM loader module exports
 */

export { WasmLoader } from './WasmLoader.js';
export type { LoadedParser, SupportedLanguage } from './types.js';
