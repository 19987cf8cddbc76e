import type { AppConfigInput } from './schema';

export const config: AppConfigInput = {
  simulation: {
    render: false,
    port: 8813,
    numClients: 1,
    stepLength: 0.1,
    printWarnings: false,
    noStepLog: true,
    teleportTime: -1,
    overtakeRight: false,
    configFile: null,
    scenarioName: 'ring',
    emissionPath: null,
    settleDelaySeconds: 1,
  },

  session: {
    backend: 'traci',
    horizon: 3000,
    stepIntervalSeconds: 0,
    autoStart: false,
  },

  runtime: {
    logLevel: 'info',
  },
};
