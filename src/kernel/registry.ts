/**
 * Backend registry: maps backend selectors to the factory that builds a
 * SimControl plus its subsystems. New engines register here without the
 * Kernel facade changing.
 */

import { TRACI_BACKEND, createTraciBackend } from './traci/backend';
import type { BackendFactory } from './types';

const backends: Map<string, BackendFactory> = new Map([[TRACI_BACKEND, createTraciBackend]]);

export function registerBackend(name: string, factory: BackendFactory): () => void {
  if (backends.has(name)) {
    throw new Error(`Backend "${name}" is already registered`);
  }
  backends.set(name, factory);
  return () => {
    backends.delete(name);
  };
}

export function getBackend(name: string): BackendFactory | undefined {
  return backends.get(name);
}

export function listBackends(): string[] {
  return [...backends.keys()];
}
