import { NodeProcessSupervisor } from '../../process';
import { TraciClient } from '../../protocol';
import type { BackendFactory } from '../types';
import { TraciSimControl } from './simControl';
import { TraciSimulation } from './simulation';
import { TraciTrafficLight } from './trafficLight';
import { TraciVehicle } from './vehicle';

export const TRACI_BACKEND = 'traci';

export const createTraciBackend: BackendFactory = (config, deps) => {
  const protocol = deps.protocol ?? new TraciClient({
    host: config.host,
    retryDelayMs: config.connectRetryDelaySeconds * 1000,
    sleep: deps.sleep,
  });

  return {
    simControl: new TraciSimControl(config, {
      supervisor: deps.supervisor ?? new NodeProcessSupervisor(),
      protocol,
      sleep: deps.sleep,
    }),
    vehicle: new TraciVehicle(),
    trafficLight: new TraciTrafficLight(),
    simulation: new TraciSimulation(config),
  };
};
