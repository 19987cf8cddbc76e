/**
 * Session singleton: one kernel-driving session per process.
 *
 * A kernel must never be shared across training workers, so the server runs
 * at most one session. Parallel environments belong in separate processes,
 * each with its own engine and port.
 */

import {
  createSessionRunner,
  type SessionKernel,
  type SessionRunner,
  type SessionRunnerConfig,
} from './sessionRunner';

// ── Module-level singleton state ────────────────────────────────────

let activeSession: SessionRunner | null = null;
let activeCompletion: Promise<void> | null = null;

// ── Public API ──────────────────────────────────────────────────────

/**
 * Create, register as singleton, and start a session.
 * Throws if a session is already running.
 */
export function startSession(kernel: SessionKernel, config: SessionRunnerConfig): SessionRunner {
  if (activeSession !== null && activeSession.getState() === 'running') {
    throw new Error(
      'A session is already running. ' +
      'Each process drives one kernel; stop the current session before starting another.'
    );
  }

  const session = createSessionRunner(kernel, config);
  activeSession = session;
  activeCompletion = session.start().catch((err: unknown) => {
    console.error('[Session] Session failed:', err);
  });

  return session;
}

/**
 * Stop the active session and wait until its kernel is closed.
 * No-op if no session is active.
 */
export async function stopSession(): Promise<void> {
  const session = activeSession;
  const completion = activeCompletion;
  activeSession = null;
  activeCompletion = null;

  if (session !== null) {
    session.stop();
    await completion;
  }
}

/**
 * Get the current session (running or finished), or null if none was started.
 */
export function getActiveSession(): SessionRunner | null {
  return activeSession;
}

/**
 * Check whether a session is currently running.
 */
export function isSessionRunning(): boolean {
  return activeSession !== null && activeSession.getState() === 'running';
}

/**
 * Reset singleton state. Intended for testing only.
 * @internal
 */
export async function _resetSessionSingleton(): Promise<void> {
  await stopSession();
}
