import { spawn } from 'child_process';
import * as readline from 'readline';
import { PassThrough, Readable } from 'stream';

/**
 * The part of a ChildProcess a task relies on
 */
export interface SupervisedProcess {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  once(event: 'spawn', listener: () => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
}

export type ProcessLauncher = (command: string, args: readonly string[]) => SupervisedProcess;

export const spawnProcess: ProcessLauncher = (command, args) => {
  return spawn(command, args, {
    stdio: ['ignore', 'pipe', 'pipe'],
    env: { ...process.env, LANG: 'en_US.UTF-8', LC_ALL: 'en_US.UTF-8' },
  });
};

/**
 * Resolves with the spawn error, or null once the process is running.
 * A missing executable surfaces as an 'error' event, not a throw.
 */
export function waitForSpawn(proc: SupervisedProcess): Promise<Error | null> {
  return new Promise((resolve) => {
    proc.once('spawn', () => resolve(null));
    proc.once('error', (error) => resolve(error));
  });
}

/**
 * Merge stdout and stderr into a single line stream.
 * Invalid UTF-8 is replaced rather than treated as an error.
 */
export function createLineReader(proc: SupervisedProcess): readline.Interface {
  const output = new PassThrough();
  output.setEncoding('utf8');

  const sources = [proc.stdout, proc.stderr].filter((stream): stream is Readable => stream !== null);
  let open = sources.length;

  for (const source of sources) {
    let finished = false;
    const onFinished = () => {
      if (finished) return;
      finished = true;
      open -= 1;
      if (open === 0) output.end();
    };
    source.pipe(output, { end: false });
    // A destroyed pipe emits 'close' without 'end'
    source.once('end', onFinished);
    source.once('close', onFinished);
  }

  if (open === 0) {
    output.end();
  }

  return readline.createInterface({ input: output, crlfDelay: Infinity });
}

/**
 * A process that was actually started and has not exited yet
 */
export function isProcessAlive(proc: SupervisedProcess): boolean {
  return proc.pid !== undefined && proc.exitCode === null && proc.signalCode === null;
}
