export {
  // Types
  type StepContext,
  type StepHandler,
  type SessionRunnerConfig,
  type SessionState,
  type SessionKernel,
  type SessionRunner,

  // Factory (low-level; prefer singleton API below)
  createSessionRunner,
} from './sessionRunner';

export {
  // Singleton API (one kernel per process)
  startSession,
  stopSession,
  getActiveSession,
  isSessionRunning,
  _resetSessionSingleton,
} from './singleton';
