/**
 * Kernel: simulator-agnostic facade over one engine instance.
 *
 *   const kernel = new Kernel('traci', { port: 8813 });
 *   await kernel.start();
 *   await kernel.step();
 *   kernel.vehicle.getIds();
 *   await kernel.close();
 *
 * One kernel owns one process and one connection. Parallel environments use
 * independent kernels on distinct ports.
 */

import { parseSimulationConfig } from '../config';
import type { SimulationConfig, SimulationConfigInput } from '../config/schema';
import { ConfigurationError, NotStartedError } from '../errors';
import type { Connection, ConnectionHandle } from '../protocol';
import { getBackend, listBackends } from './registry';
import type {
  BackendDependencies,
  KernelState,
  SimControl,
  SimulationSubsystem,
  TrafficLightSubsystem,
  VehicleSubsystem,
} from './types';

export class Kernel {
  readonly backend: string;
  readonly config: SimulationConfig;
  readonly simControl: SimControl;
  readonly vehicle: VehicleSubsystem;
  readonly trafficLight: TrafficLightSubsystem;
  readonly simulation: SimulationSubsystem;

  private state: KernelState = 'uninitialized';
  private connection: ConnectionHandle | null = null;

  /**
   * Validation happens before anything is built: an unknown backend or an
   * invalid config throws ConfigurationError and no process is spawned.
   */
  constructor(backend: string, config: SimulationConfigInput, deps: BackendDependencies = {}) {
    const factory = getBackend(backend);
    if (!factory) {
      throw new ConfigurationError(
        `Simulator type "${backend}" is not valid. Registered backends: ${listBackends().join(', ')}`,
      );
    }

    this.backend = backend;
    this.config = parseSimulationConfig(config);

    const components = factory(this.config, deps);
    this.simControl = components.simControl;
    this.vehicle = components.vehicle;
    this.trafficLight = components.trafficLight;
    this.simulation = components.simulation;
  }

  getState(): KernelState {
    return this.state;
  }

  getConnection(): ConnectionHandle | null {
    return this.connection;
  }

  /**
   * Start the engine and hand the new connection to every subsystem. If a
   * subsystem rejects the connection, the engine and socket are torn down and
   * the kernel ends up closed.
   */
  async start(): Promise<Connection> {
    const connection = await this.simControl.start();
    try {
      await this.passConnection(connection);
    } catch (err) {
      console.error('[Kernel] Subsystem setup failed, shutting the engine down:', err);
      this.state = 'closed';
      this.connection = null;
      await this.simControl.close();
      throw err;
    }
    return connection;
  }

  /**
   * SimControl registers the simulation-level subscriptions first; vehicle,
   * traffic light and simulation metadata then follow in that order and may
   * rely on what came before them.
   */
  async passConnection(connection: ConnectionHandle): Promise<void> {
    if (this.state !== 'uninitialized') {
      throw new Error(`Cannot pass a connection to a kernel in state "${this.state}"`);
    }

    this.connection = connection;
    await this.simControl.passConnection(connection);
    await this.vehicle.passConnection(connection);
    await this.trafficLight.passConnection(connection);
    await this.simulation.passConnection(connection);
    this.state = 'connected';
  }

  /** Refresh subsystem caches after a step, always in the same order. */
  async update(reset: boolean): Promise<void> {
    await this.vehicle.update(reset);
    await this.trafficLight.update(reset);
    await this.simulation.update(reset);
    await this.simControl.update(reset);
  }

  async step(reset = false): Promise<void> {
    await this.simControl.step();
    await this.update(reset);
  }

  checkCollision(): boolean {
    return this.simControl.checkCollision();
  }

  /**
   * Simulation metadata closes first, while the connection is still live,
   * then SimControl closes the connection and the process.
   */
  async close(): Promise<void> {
    if (this.state === 'uninitialized') {
      throw new NotStartedError('Cannot close a kernel that never received a connection');
    }
    if (this.state === 'closed') {
      console.warn('[Kernel] close() called on an already closed kernel');
      return;
    }
    this.state = 'closed';

    try {
      await this.simulation.close();
    } catch (err) {
      console.error('[Kernel] Error closing simulation metadata:', err);
    }

    try {
      await this.simControl.close();
    } catch (err) {
      console.error('[Kernel] Error closing sim control:', err);
    }

    this.connection = null;
  }
}
