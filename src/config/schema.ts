import { z } from 'zod';

export const EngineBinaryConfigSchema = z.object({
  headless: z.string().min(1).describe('Engine binary used when not rendering'),
  rendered: z.string().min(1).describe('Engine binary used when rendering'),
}).strict();

export const SimulationConfigSchema = z.object({
  render: z.boolean().default(false).describe('Launch the rendered engine variant'),
  engineBinary: EngineBinaryConfigSchema.default({ headless: 'sumo', rendered: 'sumo-gui' }),
  host: z.string().min(1).default('localhost').describe('Host the control protocol listens on'),
  port: z.number().int().positive().describe('Remote control port (> 0)'),
  numClients: z.number().int().min(1).default(1).describe('Number of control clients the engine waits for'),
  stepLength: z.number().positive().default(0.1).describe('Simulated seconds per step (> 0)'),
  lateralResolution: z.number().positive().nullable().default(null).describe('Sublane resolution in meters'),
  emissionPath: z.string().min(1).nullable().default(null).describe('Directory for emission output'),
  seed: z.number().int().nullable().default(null).describe('Engine random seed'),
  printWarnings: z.boolean().default(false).describe('Keep engine warnings on (silenced unless requested)'),
  noStepLog: z.boolean().default(true).describe('Suppress per-step engine logging'),
  teleportTime: z.number().default(-1).describe('Seconds before a jammed vehicle is teleported (-1 disables)'),
  overtakeRight: z.boolean().default(false).describe('Allow overtaking on the right'),
  configFile: z.string().min(1).nullable().default(null).describe('Engine configuration file passed with -c'),
  scenarioName: z.string().min(1).default('simulation').describe('Scenario name used for output files'),
  settleDelaySeconds: z.number().min(0).default(1).describe('Wait between spawn and connect'),
  testMode: z.boolean().default(false).describe('Use the short test settle delay'),
  connectAttempts: z.number().int().min(1).default(100).describe('Socket attempts per start attempt'),
  connectRetryDelaySeconds: z.number().min(0).default(1).describe('Wait between socket attempts'),
  maxStartAttempts: z.number().int().min(1).default(10).describe('Spawn+connect attempts before giving up'),
}).strict();

export const SessionConfigSchema = z.object({
  backend: z.string().min(1).describe('Backend selector for the kernel'),
  horizon: z.number().int().min(1).describe('Steps per session'),
  stepIntervalSeconds: z.number().min(0).max(60).describe('Wall-clock pause between steps (0 = back to back)'),
  autoStart: z.boolean().describe('Start a session when the server boots'),
}).strict();

export const RuntimeConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).describe('Logging level'),
}).strict();

export const AppConfigSchema = z.object({
  simulation: SimulationConfigSchema,
  session: SessionConfigSchema,
  runtime: RuntimeConfigSchema,
}).strict();

export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;
export type SimulationConfig = z.output<typeof SimulationConfigSchema>;

export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type AppConfig = z.output<typeof AppConfigSchema>;

export interface DerivedConfig {
  engineBinary: string;
  settleDelayMs: number;
  stepsPerSimulatedSecond: number;
  horizonSimulatedSeconds: number;
}

export interface ValidatedConfig {
  simulation: AppConfig['simulation'];
  session: AppConfig['session'];
  runtime: AppConfig['runtime'];
  derived: DerivedConfig;
}
