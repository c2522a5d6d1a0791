import terminalKit from 'terminal-kit';
import type { DocumentResult } from '../pipeline/types.js';

export type ProgressHandler = (done: number, total: number, result: DocumentResult) => void;

export interface ProgressReporter {
  onProgress: ProgressHandler;
  stop(): void;
}

/**
 * A terminal-kit progress bar on interactive terminals; elsewhere a no-op so
 * piped output stays clean.
 */
export function createProgressReporter(total: number, enabled: boolean): ProgressReporter {
  if (!enabled || !process.stdout.isTTY || total === 0) {
    return { onProgress: () => undefined, stop: () => undefined };
  }

  const term = terminalKit.terminal;
  const bar = term.progressBar({
    title: 'Converting',
    width: 60,
    percent: true,
    eta: true,
  });

  return {
    onProgress: (done, count) => {
      bar.update(done / count);
    },
    stop: () => {
      bar.stop();
      term('\n');
    },
  };
}
