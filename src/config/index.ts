import { config } from './config';
import {
  AppConfigSchema,
  SimulationConfigSchema,
  type AppConfig,
  type DerivedConfig,
  type SimulationConfig,
  type ValidatedConfig,
} from './schema';
import { ZodError } from 'zod';
import { ConfigurationError } from '../errors';

/** Settle delay used instead of `settleDelaySeconds` when test mode is on. */
export const TEST_SETTLE_DELAY_MS = 100;

let cachedConfig: ValidatedConfig | null = null;

export function resolveSettleDelayMs(simulation: SimulationConfig): number {
  return simulation.testMode ? TEST_SETTLE_DELAY_MS : simulation.settleDelaySeconds * 1000;
}

export function resolveEngineBinary(simulation: SimulationConfig): string {
  return simulation.render ? simulation.engineBinary.rendered : simulation.engineBinary.headless;
}

/** Any non-empty TEST_FLAG turns test mode on. */
export function isTestFlagSet(env: NodeJS.ProcessEnv = process.env): boolean {
  const flag = env.TEST_FLAG;
  return flag !== undefined && flag !== '';
}

function computeDerived(validatedConfig: AppConfig): DerivedConfig {
  const { simulation, session } = validatedConfig;

  return {
    engineBinary: resolveEngineBinary(simulation),
    settleDelayMs: resolveSettleDelayMs(simulation),
    stepsPerSimulatedSecond: 1 / simulation.stepLength,
    horizonSimulatedSeconds: session.horizon * simulation.stepLength,
  };
}

export function formatZodError(error: ZodError, header = 'Configuration validation failed:'): string {
  const lines = [header, ''];

  for (const issue of error.issues) {
    const path = issue.path.join('.') || 'root';

    if (issue.code === 'invalid_type') {
      lines.push(
        `  ❌ ${path}:`,
        `     Expected: ${issue.expected}`,
        `     Received: ${issue.received}`,
        ''
      );
    } else if (issue.code === 'unrecognized_keys') {
      lines.push(
        `  ❌ ${path}:`,
        `     Unrecognized keys: ${issue.keys.join(', ')}`,
        `     (This may be a typo or unsupported field)`,
        ''
      );
    } else {
      lines.push(
        `  ❌ ${path}:`,
        `     ${issue.message}`,
        ''
      );
    }
  }

  return lines.join('\n');
}

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);

  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return obj;
}

/**
 * Validate a SimulationConfig for a kernel. Synchronous and side-effect free;
 * invalid input raises ConfigurationError carrying the formatted issues.
 */
export function parseSimulationConfig(input: unknown): SimulationConfig {
  const result = SimulationConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      formatZodError(result.error, 'Simulation configuration is invalid:'),
      { cause: result.error },
    );
  }
  return deepFreeze(result.data);
}

export function getConfig(): ValidatedConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  try {
    const validated = AppConfigSchema.parse(config);

    if (isTestFlagSet()) {
      validated.simulation.testMode = true;
    }

    const fullConfig: ValidatedConfig = {
      ...validated,
      derived: computeDerived(validated),
    };

    cachedConfig = deepFreeze(fullConfig);

    return cachedConfig;
  } catch (error) {
    if (error instanceof ZodError) {
      console.error(`${formatZodError(error)}\nPlease fix the configuration and restart the server.`);
      throw new ConfigurationError('Configuration validation failed. See error details above.', { cause: error });
    }
    throw error;
  }
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
