import type { AppConfig } from './config.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { RunReport } from './run.js';

export type RunState = {
  running: boolean;
  lastReport: RunReport | null;
  lastError: { at: string; message: string } | null;
};

export type RunTrigger = {
  state: () => RunState;
  /** Starts a run unless one is already in progress; resolves when it ends. */
  trigger: () => { started: boolean; done: Promise<void> };
  whenIdle: () => Promise<void>;
};

export function createRunTrigger(run: () => Promise<RunReport>, logger: Logger): RunTrigger {
  const state: RunState = { running: false, lastReport: null, lastError: null };
  let current: Promise<void> = Promise.resolve();

  return {
    state: () => ({ ...state }),
    trigger: () => {
      if (state.running) return { started: false, done: current };
      state.running = true;
      current = run()
        .then((report) => {
          state.lastReport = report;
          state.lastError = null;
        })
        .catch((e: unknown) => {
          state.lastError = { at: new Date().toISOString(), message: errorMessage(e) };
          logger.error({ err: errorMessage(e) }, 'run failed');
        })
        .finally(() => {
          state.running = false;
        });
      return { started: true, done: current };
    },
    whenIdle: () => current
  };
}

export type SchedulerHandle = {
  close: () => Promise<void>;
};

export function startScheduledRuns(config: AppConfig, runs: RunTrigger, logger: Logger): SchedulerHandle {
  // Avoid background timers in unit/integration tests.
  if (config.NODE_ENV === 'test') {
    return { close: async () => undefined };
  }

  const tick = () => {
    const { started } = runs.trigger();
    if (!started) logger.warn('previous run still in progress; skipping scheduled run');
  };

  // First run shortly after startup, then on the configured interval.
  const initial = setTimeout(tick, 5_000);
  const interval = setInterval(tick, config.RUN_INTERVAL_MINUTES * 60_000);
  initial.unref?.();
  interval.unref?.();

  return {
    close: async () => {
      clearTimeout(initial);
      clearInterval(interval);
      await runs.whenIdle();
    }
  };
}
