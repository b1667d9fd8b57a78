import type { ProgressEvent } from '../execution/types.js';

export interface TimingCollector {
  observe(event: ProgressEvent): void;
  /** Wall-clock milliseconds per completed step, retries and rework included. */
  snapshot(): Record<string, number>;
}

export function createTimingCollector(now: () => number = Date.now): TimingCollector {
  const started = new Map<string, number>();
  const totals = new Map<string, number>();

  return {
    observe(event) {
      if (!event.stepId) {
        return;
      }
      if (event.type === 'step-start' && event.attempt === 1) {
        started.set(event.stepId, now());
      } else if (event.type === 'step-complete') {
        const start = started.get(event.stepId);
        if (start !== undefined) {
          totals.set(event.stepId, (totals.get(event.stepId) ?? 0) + now() - start);
          started.delete(event.stepId);
        }
      }
    },
    snapshot() {
      return Object.fromEntries(totals);
    },
  };
}
