import { NotStartedError } from '../../errors';
import {
  ID_LIST,
  TL_RED_YELLOW_GREEN_STATE,
  asStringList,
  type ConnectionHandle,
} from '../../protocol';
import type { TrafficLightSubsystem } from '../types';

/** Signal phases of every traffic light, e.g. "GrGr" per controlled link. */
export class TraciTrafficLight implements TrafficLightSubsystem {
  private connection: ConnectionHandle | null = null;
  private ids: readonly string[] = [];
  private readonly states = new Map<string, string>();

  async passConnection(connection: ConnectionHandle): Promise<void> {
    this.connection = connection;
    this.ids = asStringList(await connection.getVariable('trafficLight', ID_LIST, ''), 'traffic light ids');

    for (const id of this.ids) {
      await connection.subscribe('trafficLight', id, [TL_RED_YELLOW_GREEN_STATE]);
    }
  }

  async update(reset: boolean): Promise<void> {
    if (this.connection === null) {
      throw new NotStartedError('Traffic light subsystem has no connection');
    }

    if (reset) {
      this.states.clear();
    }

    const results = this.connection.getAllSubscriptionResults('trafficLight');
    for (const id of this.ids) {
      const state = results.get(id)?.get(TL_RED_YELLOW_GREEN_STATE);
      if (typeof state === 'string') {
        this.states.set(id, state);
      }
    }
  }

  getIds(): readonly string[] {
    return this.ids;
  }

  getState(id: string): string | undefined {
    return this.states.get(id);
  }
}
