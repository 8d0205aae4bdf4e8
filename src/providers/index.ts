export type { IEmbeddingProvider } from './IEmbeddingProvider.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export type { INarrativeProvider, NarrativeInput } from './INarrativeProvider.js';
export { OpenAINarrativeProvider } from './OpenAINarrativeProvider.js';
export type { ILogProvider, LogEvent, LogFields, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { LOG_LEVELS, isLogLevel, shouldLog } from './ILogProvider.js';
export { LeveledLogProvider } from './LeveledLogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
