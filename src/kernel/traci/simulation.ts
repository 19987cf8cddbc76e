import type { SimulationConfig } from '../../config/schema';
import { NotStartedError } from '../../errors';
import {
  VAR_ARRIVED_VEHICLES_IDS,
  VAR_DELTA_T,
  VAR_DEPARTED_VEHICLES_IDS,
  VAR_TIME_STEP,
  asStringList,
  type ConnectionHandle,
} from '../../protocol';
import type { SimulationSubsystem } from '../types';

/**
 * Simulation metadata: clock, step delta and departure/arrival totals since
 * the last reset.
 */
export class TraciSimulation implements SimulationSubsystem {
  private connection: ConnectionHandle | null = null;
  private timeSeconds = 0;
  private deltaT: number;
  private totalDeparted = 0;
  private totalArrived = 0;

  constructor(config: SimulationConfig) {
    this.deltaT = config.stepLength;
  }

  async passConnection(connection: ConnectionHandle): Promise<void> {
    this.connection = connection;
  }

  async update(reset: boolean): Promise<void> {
    if (this.connection === null) {
      throw new NotStartedError('Simulation subsystem has no connection');
    }

    if (reset) {
      this.totalDeparted = 0;
      this.totalArrived = 0;
    }

    const values = this.connection.getSubscriptionResults('simulation', '');
    if (!values) return;

    // The time step variable is reported in milliseconds
    const timeStep = values.get(VAR_TIME_STEP);
    if (typeof timeStep === 'number') {
      this.timeSeconds = timeStep / 1000;
    }

    const deltaT = values.get(VAR_DELTA_T);
    if (typeof deltaT === 'number') {
      this.deltaT = deltaT;
    }

    this.totalDeparted += asStringList(values.get(VAR_DEPARTED_VEHICLES_IDS), 'departed ids').length;
    this.totalArrived += asStringList(values.get(VAR_ARRIVED_VEHICLES_IDS), 'arrived ids').length;
  }

  getTime(): number {
    return this.timeSeconds;
  }

  getDeltaT(): number {
    return this.deltaT;
  }

  getTotalDeparted(): number {
    return this.totalDeparted;
  }

  getTotalArrived(): number {
    return this.totalArrived;
  }

  async close(): Promise<void> {
    console.log(
      `[Simulation] Closing at t=${this.timeSeconds.toFixed(2)}s | ` +
      `departed=${this.totalDeparted} arrived=${this.totalArrived}`
    );
  }
}
