/**
 * TraciVehicle: per-vehicle kinematics and routing cache.
 *
 * Vehicles enter and leave the cache through the departed/arrived lists of
 * the simulation-level subscription, so SimControl must have subscribed
 * before this subsystem sees its first update.
 */

import { NotStartedError } from '../../errors';
import {
  VAR_ARRIVED_VEHICLES_IDS,
  VAR_DEPARTED_VEHICLES_IDS,
  VAR_LANEPOSITION,
  VAR_ROAD_ID,
  VAR_SPEED,
  asStringList,
  type ConnectionHandle,
  type VariableValues,
} from '../../protocol';
import type { VehicleSubsystem } from '../types';

export const VEHICLE_SUBSCRIPTION: readonly number[] = [VAR_SPEED, VAR_ROAD_ID, VAR_LANEPOSITION];

export interface VehicleState {
  /** m/s */
  readonly speed: number;
  readonly edge: string;
  /** Meters from the start of the lane */
  readonly lanePosition: number;
}

export class TraciVehicle implements VehicleSubsystem {
  private connection: ConnectionHandle | null = null;
  private readonly ids = new Set<string>();
  private readonly states = new Map<string, VehicleState>();
  private departed: readonly string[] = [];
  private arrived: readonly string[] = [];

  async passConnection(connection: ConnectionHandle): Promise<void> {
    this.connection = connection;
  }

  async update(reset: boolean): Promise<void> {
    if (this.connection === null) {
      throw new NotStartedError('Vehicle subsystem has no connection');
    }
    const connection = this.connection;

    if (reset) {
      this.ids.clear();
      this.states.clear();
    }

    const simulation = connection.getSubscriptionResults('simulation', '');
    this.departed = asStringList(simulation?.get(VAR_DEPARTED_VEHICLES_IDS), 'departed ids');
    this.arrived = asStringList(simulation?.get(VAR_ARRIVED_VEHICLES_IDS), 'arrived ids');

    for (const id of this.departed) {
      if (!this.ids.has(id)) {
        this.ids.add(id);
        await connection.subscribe('vehicle', id, VEHICLE_SUBSCRIPTION);
      }
    }

    for (const id of this.arrived) {
      this.ids.delete(id);
      this.states.delete(id);
    }

    const results = connection.getAllSubscriptionResults('vehicle');
    for (const id of this.ids) {
      const state = readVehicleState(results.get(id));
      if (state) {
        this.states.set(id, state);
      }
    }
  }

  getIds(): readonly string[] {
    return [...this.ids];
  }

  getDepartedIds(): readonly string[] {
    return this.departed;
  }

  getArrivedIds(): readonly string[] {
    return this.arrived;
  }

  getState(id: string): VehicleState | undefined {
    return this.states.get(id);
  }

  getSpeed(id: string): number | undefined {
    return this.states.get(id)?.speed;
  }

  getEdge(id: string): string | undefined {
    return this.states.get(id)?.edge;
  }

  getLanePosition(id: string): number | undefined {
    return this.states.get(id)?.lanePosition;
  }
}

// Incomplete results (a variable answered with an error) keep the previous state
function readVehicleState(values: VariableValues | undefined): VehicleState | null {
  if (!values) return null;

  const speed = values.get(VAR_SPEED);
  const edge = values.get(VAR_ROAD_ID);
  const lanePosition = values.get(VAR_LANEPOSITION);

  if (typeof speed !== 'number' || typeof edge !== 'string' || typeof lanePosition !== 'number') {
    return null;
  }
  return { speed, edge, lanePosition };
}
