/**
 * SessionRunner: drives one kernel through a fixed horizon of steps.
 *
 * Each step:
 *   1. Advances the engine one step and refreshes the kernel subsystems
 *   2. Checks for a collision (teleport) in that step
 *   3. Calls all registered step handlers in order
 *   4. Waits out the rest of the step interval, compensating for execution time
 *
 * The kernel is closed when the horizon is reached, on stop(), or on failure.
 */

import { setTimeout as delay } from 'timers/promises';
import type { Kernel } from '../kernel';

// ── Types ───────────────────────────────────────────────────────────

export interface StepContext {
  /** Step number (1-indexed, increments each step) */
  readonly stepNumber: number;
  /** Engine clock after this step, in seconds */
  readonly simTimeSeconds: number;
  /** Whether a teleport (collision proxy) started in this step */
  readonly collided: boolean;
  /** Vehicles currently in the network */
  readonly vehicleCount: number;
}

/**
 * A step handler is called once per step.
 * Handlers run in registration order; a throwing handler does not stop the session.
 */
export type StepHandler = (ctx: StepContext) => void;

export interface SessionRunnerConfig {
  /** Number of steps in the session */
  horizon: number;
  /** Wall-clock interval between steps, in seconds (0 = back to back) */
  stepIntervalSeconds: number;
  sleep?: (ms: number) => Promise<void>;
}

export type SessionState = 'idle' | 'running' | 'finished' | 'stopped' | 'failed';

export type SessionKernel = Pick<
  Kernel,
  'start' | 'step' | 'checkCollision' | 'close' | 'getState' | 'simulation' | 'vehicle' | 'trafficLight'
>;

export interface SessionRunner {
  /** Register a step handler. Returns an unregister function. */
  registerHandler(name: string, handler: StepHandler): () => void;
  /** Run the session. Resolves once the kernel has been closed. */
  start(): Promise<void>;
  /** Ask the session to stop after the current step. */
  stop(): void;
  getState(): SessionState;
  getStepNumber(): number;
  getCollisionCount(): number;
  getHorizon(): number;
  getKernel(): SessionKernel;
}

// ── Session Runner ──────────────────────────────────────────────────

export function createSessionRunner(kernel: SessionKernel, config: SessionRunnerConfig): SessionRunner {
  const { horizon, stepIntervalSeconds } = config;
  const stepIntervalMs = stepIntervalSeconds * 1000;
  const sleep = config.sleep ?? ((ms: number) => delay(ms));

  if (!Number.isInteger(horizon) || horizon < 1) {
    throw new Error(`horizon must be a positive integer, got ${horizon}`);
  }

  const handlers: Map<string, StepHandler> = new Map();
  let state: SessionState = 'idle';
  let stopRequested = false;
  let stepNumber = 0;
  let collisionCount = 0;

  async function runStep(): Promise<void> {
    const stepStart = performance.now();

    await kernel.step();
    stepNumber++;

    const collided = kernel.checkCollision();
    if (collided) {
      collisionCount++;
      console.log(`[Session] Collision (teleport) at step ${stepNumber}`);
    }

    const ctx: StepContext = Object.freeze({
      stepNumber,
      simTimeSeconds: kernel.simulation.getTime(),
      collided,
      vehicleCount: kernel.vehicle.getIds().length,
    });

    for (const [name, handler] of handlers) {
      try {
        handler(ctx);
      } catch (err) {
        console.error(`[Session] Handler "${name}" threw on step ${stepNumber}:`, err);
      }
    }

    const stepDuration = performance.now() - stepStart;
    console.debug(
      `[Session] Step ${stepNumber}/${horizon} | t=${ctx.simTimeSeconds.toFixed(2)}s | ` +
      `vehicles=${ctx.vehicleCount} | ${stepDuration.toFixed(1)}ms`
    );

    const nextDelay = Math.max(0, stepIntervalMs - stepDuration);
    if (nextDelay > 0 && !stopRequested && stepNumber < horizon) {
      await sleep(nextDelay);
    }
  }

  async function closeKernel(): Promise<void> {
    if (kernel.getState() === 'connected') {
      await kernel.close();
    }
  }

  return {
    registerHandler(name: string, handler: StepHandler): () => void {
      if (handlers.has(name)) {
        throw new Error(`Handler "${name}" is already registered`);
      }
      handlers.set(name, handler);
      return () => {
        handlers.delete(name);
      };
    },

    async start(): Promise<void> {
      if (state !== 'idle') {
        throw new Error(`Session cannot start from state "${state}"`);
      }
      state = 'running';

      console.log(`[Session] Starting: horizon=${horizon} steps, interval=${stepIntervalSeconds}s`);
      console.log(`[Session] Registered handlers: ${handlers.size > 0 ? [...handlers.keys()].join(', ') : '(none)'}`);

      try {
        await kernel.start();
        while (!stopRequested && stepNumber < horizon) {
          await runStep();
        }
        state = stopRequested ? 'stopped' : 'finished';
      } catch (err) {
        state = 'failed';
        throw err;
      } finally {
        await closeKernel();
        console.log(`[Session] ${state} at step ${stepNumber} | collisions=${collisionCount}`);
      }
    },

    stop(): void {
      if (state !== 'running') return;
      stopRequested = true;
    },

    getState(): SessionState {
      return state;
    },

    getStepNumber(): number {
      return stepNumber;
    },

    getCollisionCount(): number {
      return collisionCount;
    },

    getHorizon(): number {
      return horizon;
    },

    getKernel(): SessionKernel {
      return kernel;
    },
  };
}
