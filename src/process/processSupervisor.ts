/**
 * ProcessSupervisor: owns the engine's OS process.
 *
 * On POSIX the engine is spawned detached, which makes it the leader of a new
 * process group; kill() signals the whole group so anything the engine forked
 * goes down with it. Windows has no process groups, so kill() falls back to
 * the child handle.
 */

import { spawn, type ChildProcess } from 'child_process';
import { SpawnError } from '../errors';

export interface ProcessHandle {
  readonly pid: number;
  /** Process group id; equals `pid` for a group leader */
  readonly pgid: number;
}

export interface ProcessSupervisor {
  spawn(command: string, args: readonly string[]): Promise<ProcessHandle>;
  /** Terminate the process group. Never throws. */
  kill(handle: ProcessHandle): void;
}

export class NodeProcessSupervisor implements ProcessSupervisor {
  private readonly children = new Map<number, ChildProcess>();

  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  spawn(command: string, args: readonly string[]): Promise<ProcessHandle> {
    const usesGroups = this.platform !== 'win32';

    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(command, [...args], { detached: usesGroups, stdio: 'inherit' });
      } catch (err) {
        reject(new SpawnError(`Failed to spawn ${command}: ${describe(err)}`, { cause: err }));
        return;
      }

      let settled = false;

      child.on('error', (err) => {
        if (settled) {
          console.error(`[Process] ${command} (pid ${child.pid}) error: ${err.message}`);
          return;
        }
        settled = true;
        reject(new SpawnError(`Failed to spawn ${command}: ${err.message}`, { cause: err }));
      });

      child.once('spawn', () => {
        settled = true;
        const pid = child.pid;
        if (pid === undefined) {
          reject(new SpawnError(`Spawned ${command} without a process id`));
          return;
        }

        this.children.set(pid, child);
        child.once('exit', (code, signal) => {
          this.children.delete(pid);
          console.log(`[Process] ${command} (pid ${pid}) exited with ${signal ?? `code ${code}`}`);
        });

        console.log(`[Process] Spawned ${command} (pid ${pid})`);
        resolve({ pid, pgid: pid });
      });
    });
  }

  kill(handle: ProcessHandle): void {
    try {
      if (this.platform === 'win32') {
        this.children.get(handle.pid)?.kill();
      } else {
        // A negative pid addresses the whole process group
        process.kill(-handle.pgid, 'SIGTERM');
      }
    } catch (err) {
      console.error(`[Process] Error during teardown of pid ${handle.pid}: ${describe(err)}`);
    }
  }

  /** Number of spawned processes that have not exited yet. */
  liveCount(): number {
    return this.children.size;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
