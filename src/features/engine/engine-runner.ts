/**
 * Engine Runner
 *
 * Runs a compiled program through the ffmpeg binary. Standard output is
 * collected as bytes (stream targets write there), standard error as text.
 * A non-zero exit rejects with an EngineError carrying stderr verbatim;
 * nothing is retried.
 */

import { spawn as spawnProcess } from 'child_process';
import type { EventEmitter } from 'events';
import type { CompiledProgram } from '@/types/program';
import { resolveConfig, type ConfigOverrides } from '@/lib/config';
import { EngineError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { toCommandLine } from '@/features/compiler/program-emitter';

const log = createLogger('EngineRunner');

/**
 * The part of a child process the runner uses
 */
export interface EngineProcess extends EventEmitter {
  stdout: EventEmitter | null;
  stderr: EventEmitter | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFunction = (command: string, args: string[]) => EngineProcess;

export interface RunOptions {
  /** Cancels the run; the process is killed */
  signal?: AbortSignal;
  /** Overrides the configured engine timeout; 0 disables it */
  timeoutMs?: number;
  /** Overrides the configured ffmpeg path */
  ffmpegPath?: string;
  config?: ConfigOverrides;
  spawn?: SpawnFunction;
  /** Called with each stderr chunk as it arrives, e.g. for progress */
  onStderr?: (text: string) => void;
}

export interface EngineResult {
  stdout: Buffer;
  stderr: string;
  durationMs: number;
  command: string;
}

const defaultSpawn: SpawnFunction = (command, args) =>
  spawnProcess(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Factory used when a call passes no spawn function (allows mocking)
 */
let spawnFactory: SpawnFunction | null = null;

export function setSpawnFactory(factory: SpawnFunction | null): void {
  spawnFactory = factory;
}

function toBuffer(chunk: unknown): Buffer {
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
}

export function runProgram(program: CompiledProgram, options: RunOptions = {}): Promise<EngineResult> {
  const config = resolveConfig(options.config);
  const ffmpegPath = options.ffmpegPath ?? config.ffmpegPath;
  const timeoutMs = options.timeoutMs ?? config.engineTimeoutMs;
  const spawn = options.spawn ?? spawnFactory ?? defaultSpawn;
  const command = toCommandLine(program, ffmpegPath);

  return new Promise<EngineResult>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new EngineError('ffmpeg run was aborted before it started', null, ''));
      return;
    }

    const startedAt = Date.now();
    const stdout: Buffer[] = [];
    let stderr = '';
    let settled = false;
    let stopReason: string | null = null;
    let timer: NodeJS.Timeout | null = null;

    log.info(`Starting ffmpeg (${program.inputs.length} inputs, ${program.nodes.length} filters)`);
    log.debug(command);

    const child = spawn(ffmpegPath, [...program.args]);

    const onAbort = (): void => {
      stopReason = 'ffmpeg run was aborted';
      child.kill('SIGTERM');
    };

    const finish = (error: EngineError | null, exitCode: number | null): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);

      const durationMs = Date.now() - startedAt;
      if (error) {
        log.error(`${error.message} after ${durationMs}ms`);
        reject(error);
        return;
      }
      log.info(`ffmpeg finished with code ${exitCode} in ${durationMs}ms`);
      resolve({ stdout: Buffer.concat(stdout), stderr, durationMs, command });
    };

    child.stdout?.on('data', (chunk: unknown) => {
      stdout.push(toBuffer(chunk));
    });
    child.stderr?.on('data', (chunk: unknown) => {
      const text = toBuffer(chunk).toString('utf8');
      stderr += text;
      options.onStderr?.(text);
    });

    child.on('error', (error: Error) => {
      finish(new EngineError(`Failed to start ${ffmpegPath}: ${error.message}`, null, stderr), null);
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (stopReason !== null) {
        finish(new EngineError(stopReason, code, stderr, signal), code);
      } else if (code !== 0) {
        const reason = code === null ? `was killed by ${signal ?? 'a signal'}` : `exited with code ${code}`;
        finish(new EngineError(`ffmpeg ${reason}`, code, stderr, signal), code);
      } else {
        finish(null, code);
      }
    });

    options.signal?.addEventListener('abort', onAbort, { once: true });

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        stopReason = `ffmpeg timed out after ${timeoutMs}ms`;
        child.kill('SIGKILL');
      }, timeoutMs);
    }
  });
}
