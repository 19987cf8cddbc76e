/**
 * Kernel error taxonomy.
 *
 * ConfigurationError and NotStartedError are programming errors and are never
 * retried. SpawnError and ConnectError are raised by a single start attempt and
 * only reach the caller once the retry bound is exhausted.
 */

export class KernelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown backend selector or an invalid SimulationConfig. */
export class ConfigurationError extends KernelError {}

/** The engine binary could not be located or the OS refused to create it. */
export class SpawnError extends KernelError {}

/** No control-protocol session could be opened within the allowed attempts. */
export class ConnectError extends KernelError {}

/** A step or query was issued before a successful start. */
export class NotStartedError extends KernelError {}

/** The engine answered with a non-OK status or a malformed message. */
export class ProtocolError extends KernelError {}
