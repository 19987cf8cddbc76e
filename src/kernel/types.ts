import type { SimulationConfig } from '../config/schema';
import type { ProcessSupervisor } from '../process';
import type { Connection, ConnectionHandle, ProtocolClient } from '../protocol';

export type SimControlState = 'idle' | 'starting' | 'running' | 'closed';

export type KernelState = 'uninitialized' | 'connected' | 'closed';

/**
 * Engine lifecycle for one backend: start with bounded retries, step, detect
 * collisions, tear down. Implementations own exactly one process and one
 * connection.
 */
export interface SimControl {
  getState(): SimControlState;
  start(): Promise<Connection>;
  /** Register the simulation-level subscriptions the other subsystems build on. */
  passConnection(connection: ConnectionHandle): Promise<void>;
  step(): Promise<void>;
  update(reset: boolean): Promise<void>;
  checkCollision(): boolean;
  close(): Promise<void>;
}

/** A state subsystem fed by the shared connection. */
export interface KernelSubsystem {
  passConnection(connection: ConnectionHandle): Promise<void>;
  /** Refresh cached state after a step; `reset` means the caches are stale. */
  update(reset: boolean): Promise<void>;
}

export interface SimulationSubsystem extends KernelSubsystem {
  getTime(): number;
  close(): Promise<void>;
}

export interface VehicleSubsystem extends KernelSubsystem {
  getIds(): readonly string[];
}

export interface TrafficLightSubsystem extends KernelSubsystem {
  getIds(): readonly string[];
  getState(id: string): string | undefined;
}

export interface BackendComponents {
  simControl: SimControl;
  vehicle: VehicleSubsystem;
  trafficLight: TrafficLightSubsystem;
  simulation: SimulationSubsystem;
}

export interface BackendDependencies {
  supervisor?: ProcessSupervisor;
  protocol?: ProtocolClient;
  sleep?: (ms: number) => Promise<void>;
}

export type BackendFactory = (config: SimulationConfig, deps: BackendDependencies) => BackendComponents;
