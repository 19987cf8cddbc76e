import {
  TraciSimulation,
  TraciTrafficLight,
  TraciVehicle,
  VEHICLE_SUBSCRIPTION,
} from '../src/kernel';
import { parseSimulationConfig } from '../src/config';
import { NotStartedError, ProtocolError } from '../src/errors';
import {
  ID_LIST,
  TL_RED_YELLOW_GREEN_STATE,
  VAR_ARRIVED_VEHICLES_IDS,
  VAR_DELTA_T,
  VAR_DEPARTED_VEHICLES_IDS,
  VAR_LANEPOSITION,
  VAR_ROAD_ID,
  VAR_SPEED,
  VAR_TIME_STEP,
} from '../src/protocol';
import { FakeConnection } from './helpers/fakes';

let connection: FakeConnection;

/** Start a new step: previous results are dropped, then `departed`/`arrived` are published. */
async function nextStep(departed: string[] = [], arrived: string[] = []): Promise<void> {
  await connection.simulationStep();
  connection.setResults('simulation', '', [
    [VAR_DEPARTED_VEHICLES_IDS, departed],
    [VAR_ARRIVED_VEHICLES_IDS, arrived],
  ]);
}

function publishVehicle(id: string, speed: number, edge: string, lanePosition: number): void {
  connection.setResults('vehicle', id, [
    [VAR_SPEED, speed],
    [VAR_ROAD_ID, edge],
    [VAR_LANEPOSITION, lanePosition],
  ]);
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => { });
  connection = new FakeConnection();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('TraciVehicle', () => {
  let vehicle: TraciVehicle;

  beforeEach(async () => {
    vehicle = new TraciVehicle();
    await vehicle.passConnection(connection);
  });

  it('should require a connection before update', async () => {
    await expect(new TraciVehicle().update(false)).rejects.toBeInstanceOf(NotStartedError);
  });

  it('should subscribe departed vehicles once', async () => {
    await nextStep(['veh0', 'veh1']);
    await vehicle.update(false);
    await nextStep(['veh1']);
    await vehicle.update(false);

    expect(vehicle.getIds()).toEqual(['veh0', 'veh1']);
    expect(connection.subscriptions).toEqual([
      { domain: 'vehicle', objectId: 'veh0', varIds: VEHICLE_SUBSCRIPTION },
      { domain: 'vehicle', objectId: 'veh1', varIds: VEHICLE_SUBSCRIPTION },
    ]);
  });

  it('should expose this step\'s departures and arrivals', async () => {
    await nextStep(['veh0'], []);
    await vehicle.update(false);
    await nextStep([], ['veh0']);
    await vehicle.update(false);

    expect(vehicle.getDepartedIds()).toEqual([]);
    expect(vehicle.getArrivedIds()).toEqual(['veh0']);
  });

  it('should read subscribed kinematics', async () => {
    await nextStep(['veh0']);
    publishVehicle('veh0', 13.9, 'edge_a', 42.5);
    await vehicle.update(false);

    expect(vehicle.getState('veh0')).toEqual({ speed: 13.9, edge: 'edge_a', lanePosition: 42.5 });
    expect(vehicle.getSpeed('veh0')).toBe(13.9);
    expect(vehicle.getEdge('veh0')).toBe('edge_a');
    expect(vehicle.getLanePosition('veh0')).toBe(42.5);
  });

  it('should drop arrived vehicles', async () => {
    await nextStep(['veh0', 'veh1']);
    publishVehicle('veh0', 10, 'edge_a', 1);
    publishVehicle('veh1', 11, 'edge_b', 2);
    await vehicle.update(false);

    await nextStep([], ['veh0']);
    publishVehicle('veh1', 12, 'edge_b', 3);
    await vehicle.update(false);

    expect(vehicle.getIds()).toEqual(['veh1']);
    expect(vehicle.getState('veh0')).toBeUndefined();
    expect(vehicle.getSpeed('veh1')).toBe(12);
  });

  it('should keep the previous state when a step reports incomplete values', async () => {
    await nextStep(['veh0']);
    publishVehicle('veh0', 10, 'edge_a', 1);
    await vehicle.update(false);

    await nextStep();
    connection.setResults('vehicle', 'veh0', [[VAR_SPEED, 11]]);
    await vehicle.update(false);

    expect(vehicle.getState('veh0')).toEqual({ speed: 10, edge: 'edge_a', lanePosition: 1 });
  });

  it('should clear its caches on reset', async () => {
    await nextStep(['veh0']);
    publishVehicle('veh0', 10, 'edge_a', 1);
    await vehicle.update(false);

    await nextStep();
    await vehicle.update(true);

    expect(vehicle.getIds()).toEqual([]);
    expect(vehicle.getState('veh0')).toBeUndefined();
  });
});

describe('TraciTrafficLight', () => {
  it('should subscribe every traffic light in the network', async () => {
    connection.setVariable('trafficLight', ID_LIST, '', ['J1', 'J2']);
    const trafficLight = new TraciTrafficLight();

    await trafficLight.passConnection(connection);

    expect(trafficLight.getIds()).toEqual(['J1', 'J2']);
    expect(connection.subscriptions).toEqual([
      { domain: 'trafficLight', objectId: 'J1', varIds: [TL_RED_YELLOW_GREEN_STATE] },
      { domain: 'trafficLight', objectId: 'J2', varIds: [TL_RED_YELLOW_GREEN_STATE] },
    ]);
  });

  it('should cache signal states from the step results', async () => {
    connection.setVariable('trafficLight', ID_LIST, '', ['J1', 'J2']);
    const trafficLight = new TraciTrafficLight();
    await trafficLight.passConnection(connection);

    connection.setResults('trafficLight', 'J1', [[TL_RED_YELLOW_GREEN_STATE, 'GrGr']]);
    await trafficLight.update(false);

    expect(trafficLight.getState('J1')).toBe('GrGr');
    expect(trafficLight.getState('J2')).toBeUndefined();

    await connection.simulationStep();
    await trafficLight.update(true);
    expect(trafficLight.getState('J1')).toBeUndefined();
  });

  it('should reject a malformed id list', async () => {
    connection.setVariable('trafficLight', ID_LIST, '', 'J1');
    await expect(new TraciTrafficLight().passConnection(connection)).rejects.toBeInstanceOf(ProtocolError);
  });

  it('should require a connection before update', async () => {
    await expect(new TraciTrafficLight().update(false)).rejects.toBeInstanceOf(NotStartedError);
  });
});

describe('TraciSimulation', () => {
  let simulation: TraciSimulation;

  beforeEach(async () => {
    simulation = new TraciSimulation(parseSimulationConfig({ port: 8813, stepLength: 0.5 }));
    await simulation.passConnection(connection);
  });

  function publish(timeMs: number, departed: string[], arrived: string[]): void {
    connection.setResults('simulation', '', [
      [VAR_TIME_STEP, timeMs],
      [VAR_DELTA_T, 0.5],
      [VAR_DEPARTED_VEHICLES_IDS, departed],
      [VAR_ARRIVED_VEHICLES_IDS, arrived],
    ]);
  }

  it('should start from the configured step length', () => {
    expect(simulation.getTime()).toBe(0);
    expect(simulation.getDeltaT()).toBe(0.5);
  });

  it('should convert the engine clock from milliseconds', async () => {
    publish(2500, [], []);
    await simulation.update(false);

    expect(simulation.getTime()).toBe(2.5);
  });

  it('should accumulate departures and arrivals until reset', async () => {
    publish(500, ['veh0', 'veh1'], []);
    await simulation.update(false);
    publish(1000, ['veh2'], ['veh0']);
    await simulation.update(false);

    expect(simulation.getTotalDeparted()).toBe(3);
    expect(simulation.getTotalArrived()).toBe(1);

    publish(1500, [], ['veh1']);
    await simulation.update(true);

    expect(simulation.getTotalDeparted()).toBe(0);
    expect(simulation.getTotalArrived()).toBe(1);
  });

  it('should keep its values when a step has no results', async () => {
    publish(2500, ['veh0'], []);
    await simulation.update(false);
    await connection.simulationStep();
    await simulation.update(false);

    expect(simulation.getTime()).toBe(2.5);
    expect(simulation.getTotalDeparted()).toBe(1);
  });

  it('should log a summary on close', async () => {
    publish(2500, ['veh0', 'veh1'], ['veh0']);
    await simulation.update(false);

    await simulation.close();

    expect(console.log).toHaveBeenCalledWith('[Simulation] Closing at t=2.50s | departed=2 arrived=1');
  });

  it('should require a connection before update', async () => {
    const fresh = new TraciSimulation(parseSimulationConfig({ port: 8813 }));
    await expect(fresh.update(false)).rejects.toBeInstanceOf(NotStartedError);
  });
});
