/**
 * @cascade-voice/cli
 *
 * Configuration loading and pipeline assembly behind the `cascade-voice`
 * command.
 *
 * @packageDocumentation
 */

export { loadConfig } from './config.js';
export type { AssistantConfig, GenerationProvider } from './config.js';
export { createAssistant } from './assistant.js';
export type { Assistant, AssistantDependencies, AssistantOptions } from './assistant.js';
