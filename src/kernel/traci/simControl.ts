/**
 * TraciSimControl: engine lifecycle over the TraCI protocol.
 *
 * start() runs an explicit bounded loop. Each attempt spawns the engine,
 * waits for it to settle, connects and takes the first step; a failed attempt
 * tears down its own connection and process before the next one begins.
 * Once the bound is exhausted the last underlying error is rethrown as is.
 */

import * as fs from 'fs';
import { setTimeout as delay } from 'timers/promises';
import type { SimulationConfig } from '../../config/schema';
import { resolveSettleDelayMs } from '../../config';
import { NotStartedError } from '../../errors';
import type { ProcessHandle, ProcessSupervisor } from '../../process';
import {
  VAR_ARRIVED_VEHICLES_IDS,
  VAR_DELTA_T,
  VAR_DEPARTED_VEHICLES_IDS,
  VAR_TELEPORT_STARTING_VEHICLES_IDS,
  VAR_TIME_STEP,
  asStringList,
  type Connection,
  type ConnectionHandle,
  type ProtocolClient,
} from '../../protocol';
import { buildEngineCommand } from '../engineCommand';
import type { SimControl, SimControlState } from '../types';

/** Simulation-level fields every other subsystem reads from. */
export const SIMULATION_SUBSCRIPTION: readonly number[] = [
  VAR_DEPARTED_VEHICLES_IDS,
  VAR_ARRIVED_VEHICLES_IDS,
  VAR_TELEPORT_STARTING_VEHICLES_IDS,
  VAR_TIME_STEP,
  VAR_DELTA_T,
];

export type StartAttempt =
  | { ok: true; connection: Connection }
  | { ok: false; error: unknown };

export interface TraciSimControlDeps {
  supervisor: ProcessSupervisor;
  protocol: ProtocolClient;
  sleep?: (ms: number) => Promise<void>;
}

export class TraciSimControl implements SimControl {
  private state: SimControlState = 'idle';
  private process: ProcessHandle | null = null;
  private connection: Connection | null = null;
  private stepping = false;

  private readonly supervisor: ProcessSupervisor;
  private readonly protocol: ProtocolClient;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly config: SimulationConfig, deps: TraciSimControlDeps) {
    this.supervisor = deps.supervisor;
    this.protocol = deps.protocol;
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
  }

  getState(): SimControlState {
    return this.state;
  }

  async start(): Promise<Connection> {
    if (this.state !== 'idle') {
      throw new Error(`Cannot start the engine from state "${this.state}"; a kernel runs one engine per lifetime`);
    }
    this.state = 'starting';

    const { maxStartAttempts } = this.config;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxStartAttempts; attempt++) {
      const result = await this.attemptStart(attempt);
      if (result.ok) {
        this.connection = result.connection;
        this.state = 'running';
        return result.connection;
      }

      lastError = result.error;
      console.error(
        `[SimControl] Start attempt ${attempt}/${maxStartAttempts} failed: ${describe(result.error)}`,
      );
    }

    // Exhausted: the kernel instance is finished
    this.state = 'closed';
    throw lastError;
  }

  async passConnection(connection: ConnectionHandle): Promise<void> {
    await connection.subscribe('simulation', '', SIMULATION_SUBSCRIPTION);
  }

  async step(): Promise<void> {
    const connection = this.requireConnection('step');
    if (this.stepping) {
      throw new Error('A simulation step is already in progress');
    }

    this.stepping = true;
    try {
      await connection.simulationStep();
    } finally {
      this.stepping = false;
    }
  }

  async update(): Promise<void> {
    // Everything this component reads is pulled with the step itself.
  }

  /**
   * Teleports stand in for collisions: the engine removes gridlocked or
   * colliding vehicles by teleporting them.
   */
  checkCollision(): boolean {
    const connection = this.requireConnection('checkCollision');
    const values = connection.getSubscriptionResults('simulation', '');
    const teleporting = asStringList(
      values?.get(VAR_TELEPORT_STARTING_VEHICLES_IDS),
      'teleport-start ids',
    );
    return teleporting.length !== 0;
  }

  async close(): Promise<void> {
    if (this.state === 'closed') return;
    this.state = 'closed';

    const connection = this.connection;
    this.connection = null;
    if (connection) {
      try {
        await connection.close();
      } catch (err) {
        console.error(`[SimControl] Error closing the connection: ${describe(err)}`);
      }
    }

    this.teardownProcess();
  }

  private async attemptStart(attempt: number): Promise<StartAttempt> {
    const { command, args, emissionFile } = buildEngineCommand(this.config);
    let connection: Connection | null = null;

    try {
      if (this.config.emissionPath !== null) {
        fs.mkdirSync(this.config.emissionPath, { recursive: true });
      }

      console.log(`[SimControl] Starting ${command} on port ${this.config.port} (attempt ${attempt})`);
      console.debug(`[SimControl] Config file: ${this.config.configFile ?? '(none)'}`);
      if (this.config.numClients > 1) {
        console.log(`[SimControl] Num clients: ${this.config.numClients}`);
      }
      console.debug(`[SimControl] Emission file: ${emissionFile ?? '(none)'}`);
      console.debug(`[SimControl] Step length: ${this.config.stepLength}`);

      this.process = await this.supervisor.spawn(command, args);

      await this.sleep(resolveSettleDelayMs(this.config));

      connection = await this.protocol.connect(this.config.port, this.config.connectAttempts);
      await connection.setOrder(0);
      await connection.simulationStep();

      return { ok: true, connection };
    } catch (error) {
      if (connection) {
        try {
          await connection.close();
        } catch (closeError) {
          console.error(`[SimControl] Error closing a partial connection: ${describe(closeError)}`);
        }
      }
      this.teardownProcess();
      return { ok: false, error };
    }
  }

  /**
   * Kills whatever process handle exists. A rejected spawn() leaves none:
   * the supervisor only resolves once the child has a pid, so there is no
   * process group to signal for that attempt.
   */
  private teardownProcess(): void {
    if (this.process) {
      this.supervisor.kill(this.process);
      this.process = null;
    }
  }

  private requireConnection(operation: string): Connection {
    if (this.state !== 'running' || this.connection === null) {
      throw new NotStartedError(`${operation}() requires a started simulation (state: ${this.state})`);
    }
    return this.connection;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
