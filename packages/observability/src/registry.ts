/**
 * Observer registry -- factory that builds observers from config.
 *
 * Reads the `observability` section of ShellgateConfig and returns a
 * ready-to-use IObserver (potentially a MultiObserver wrapping several
 * children).
 */

import type { IObserver, ObservabilitySection } from '@shellgate/core';

import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import type { FileObserverOptions } from './file-observer.js';
import { MultiObserver } from './multi-observer.js';
import { NoopObserver } from './noop-observer.js';

export type ObservabilityConfig = Pick<ObservabilitySection, 'observers'> &
  Partial<Omit<ObservabilitySection, 'observers'>>;

/**
 * Build an IObserver from configuration.
 *
 * - If `observers` is empty, returns a NoopObserver.
 * - If a single observer is listed, returns it directly.
 * - If multiple observers are listed, wraps them in a MultiObserver.
 */
export function createObserver(config: ObservabilityConfig): IObserver {
  const { observers, logLevel = 'warn', logPath, maxLogSize } = config;

  const children: IObserver[] = [];

  for (const name of observers) {
    switch (name) {
      case 'console':
        children.push(new ConsoleObserver(logLevel));
        break;
      case 'file': {
        const fileOpts: FileObserverOptions = {};
        if (logPath) fileOpts.filePath = logPath;
        if (maxLogSize) fileOpts.maxBytes = maxLogSize;
        children.push(new FileObserver(fileOpts));
        break;
      }
      case 'noop':
        children.push(new NoopObserver());
        break;
      default:
        // Unknown observer name -- warn but do not crash.
        console.warn(`[observability] unknown observer "${name}", skipping`);
        break;
    }
  }

  const [first] = children;
  if (first === undefined) {
    return new NoopObserver();
  }

  if (children.length === 1) {
    return first;
  }

  return new MultiObserver(children);
}
