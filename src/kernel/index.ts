export {
  // Types
  type SimControl,
  type SimControlState,
  type KernelState,
  type KernelSubsystem,
  type SimulationSubsystem,
  type VehicleSubsystem,
  type TrafficLightSubsystem,
  type BackendComponents,
  type BackendDependencies,
  type BackendFactory,
} from './types';

export { Kernel } from './kernel';

export { registerBackend, getBackend, listBackends } from './registry';

export { buildEngineCommand, type EngineCommand } from './engineCommand';

export {
  TraciSimControl,
  SIMULATION_SUBSCRIPTION,
  type StartAttempt,
  type TraciSimControlDeps,
} from './traci/simControl';
export { TraciVehicle, VEHICLE_SUBSCRIPTION, type VehicleState } from './traci/vehicle';
export { TraciTrafficLight } from './traci/trafficLight';
export { TraciSimulation } from './traci/simulation';
export { TRACI_BACKEND, createTraciBackend } from './traci/backend';
