export { computeDelay, DEFAULT_BACKOFF, type BackoffPolicy } from './backoff.js';
export { createProgram, main, parseRefreshSeconds, runMonitor } from './cli.js';
export type { CliDependencies, MonitorCommandOptions } from './cli.js';
export { PollingEngine, type PollingEngineOptions } from './engine.js';
export * from './events.js';
export * from './outcome.js';
export { composeFrame, composeOutcomeLine, describeTrigger, type FrameOptions } from './render/frame.js';
export { formatClock, formatDuration } from './render/format.js';
export { supportsColor } from './render/colors.js';
export { PlainRenderer } from './render/plain.js';
export type { PipelineRenderer } from './render/renderer.js';
export { TerminalRenderer, type OutputStream } from './render/terminal.js';
export { canonicalUuid, parseRepository, PipelineResolver, type ResolveCriteria } from './resolver.js';
export * from './state.js';
