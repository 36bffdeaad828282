import { spawn, type SpawnOptions } from 'child_process';
import type { EventEmitter } from 'events';

/** The part of a ChildProcess the opener relies on */
export interface LaunchedProcess extends EventEmitter {
  unref(): void;
}

export type ProcessLauncher = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => LaunchedProcess;

export const spawnLauncher: ProcessLauncher = (command, args, options) =>
  spawn(command, args, options);
