export * from './animation/animation-clock.js';
export * from './animation/animation-diagnostics.js';
export * from './animation/animation-logger.js';
export * from './animation/diagnostic-buffer.js';
export * from './animation/playback-loop.js';
export * from './animation/progress-controller.js';
export * from './config/animation-config-types.js';
export * from './config/animation-config-loader.js';
export * from './store/structure-session-store.js';
export * from './session/structure-sessions.js';
