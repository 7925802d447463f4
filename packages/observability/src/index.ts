/**
 * @shellgate/observability -- structured observability for the gate.
 *
 * Re-exports every observer implementation and the factory registry.
 */

export { ConsoleObserver } from './console-observer.js';

export { FileObserver, redactSecrets } from './file-observer.js';
export type { FileObserverOptions } from './file-observer.js';

export { MultiObserver } from './multi-observer.js';
export { NoopObserver } from './noop-observer.js';

export { createObserver } from './registry.js';
export type { ObservabilityConfig } from './registry.js';
