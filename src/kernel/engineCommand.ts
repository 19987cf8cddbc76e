import * as path from 'path';
import type { SimulationConfig } from '../config/schema';
import { resolveEngineBinary } from '../config';

export interface EngineCommand {
  command: string;
  args: string[];
  /** Emission output file, or null when emissions are not recorded */
  emissionFile: string | null;
}

/**
 * Derive the engine invocation from a SimulationConfig. Pure: creating the
 * emission directory is left to the caller.
 */
export function buildEngineCommand(config: SimulationConfig): EngineCommand {
  const args: string[] = [];

  if (config.configFile !== null) {
    args.push('-c', config.configFile);
  }

  args.push(
    '--remote-port', String(config.port),
    '--num-clients', String(config.numClients),
    '--step-length', String(config.stepLength),
  );

  if (config.noStepLog) {
    args.push('--no-step-log');
  }

  if (config.lateralResolution !== null) {
    args.push('--lateral-resolution', String(config.lateralResolution));
  }

  let emissionFile: string | null = null;
  if (config.emissionPath !== null) {
    emissionFile = path.join(config.emissionPath, `${config.scenarioName}-emission.xml`);
    args.push('--emission-output', emissionFile);
  }

  if (config.overtakeRight) {
    args.push('--lanechange.overtake-right', 'true');
  }

  if (config.seed !== null) {
    args.push('--seed', String(config.seed));
  }

  if (!config.printWarnings) {
    args.push('--no-warnings', 'true');
  }

  // Gridlocked vehicles are teleported after this many seconds
  args.push('--time-to-teleport', String(Math.trunc(config.teleportTime)));

  args.push('--collision.check-junctions', 'true');

  return { command: resolveEngineBinary(config), args, emissionFile };
}
