/**
 * Command-line text-generation backend.
 *
 * Spawns a model CLI once per request and returns its stdout. The system
 * instructions and the serialized payload are passed as arguments; the
 * request's AbortSignal cancels the subprocess.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import type { AgentSettings } from '../config/types.js';
import { BackendError, type BackendRequest, type TextGenerationBackend } from './types.js';

/**
 * Options for creating a CommandBackend.
 */
export interface CommandBackendOptions {
  /** Executable to run (default: 'claude'). */
  executablePath?: string;
  /** Arguments placed before the generated ones on every call. */
  baseArgs?: readonly string[];
  /** Flag naming the model (default: '--model'). Empty omits the model. */
  modelFlag?: string;
  /** Flag carrying the sampling temperature (default: ''). Empty omits it. */
  temperatureFlag?: string;
  /** Flag carrying the system instructions (default: '--system-prompt'). */
  systemFlag?: string;
  /** Hard limit on one subprocess in milliseconds (default: 300000). */
  timeoutMs?: number;
  /** Working directory for subprocess execution. */
  cwd?: string;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Text-generation backend that shells out to a model CLI.
 *
 * @example
 * ```typescript
 * const backend = new CommandBackend({ executablePath: 'claude', baseArgs: ['-p'] });
 * const text = await backend.generate({ system, payload, constraints, signal });
 * ```
 */
export class CommandBackend implements TextGenerationBackend {
  private readonly executablePath: string;
  private readonly baseArgs: readonly string[];
  private readonly modelFlag: string;
  private readonly temperatureFlag: string;
  private readonly systemFlag: string;
  private readonly timeoutMs: number;
  private readonly cwd: string | undefined;

  constructor(options: CommandBackendOptions = {}) {
    this.executablePath = options.executablePath ?? 'claude';
    this.baseArgs = options.baseArgs ?? [];
    this.modelFlag = options.modelFlag ?? '--model';
    this.temperatureFlag = options.temperatureFlag ?? '';
    this.systemFlag = options.systemFlag ?? '--system-prompt';
    this.timeoutMs = options.timeoutMs ?? 300000;
    this.cwd = options.cwd;
  }

  /**
   * Builds CLI arguments for a request. The payload is the final positional argument.
   */
  buildArgs(request: BackendRequest): string[] {
    const args = [...this.baseArgs];
    if (this.modelFlag !== '' && request.constraints.model !== '') {
      args.push(this.modelFlag, request.constraints.model);
    }
    if (this.temperatureFlag !== '') {
      args.push(this.temperatureFlag, String(request.constraints.temperature));
    }
    const system =
      `${request.system}\n\nKeep the answer under ${String(request.constraints.maxTokens)} tokens.`;
    args.push(this.systemFlag, system, request.payload);
    return args;
  }

  async generate(request: BackendRequest): Promise<string> {
    const args = this.buildArgs(request);

    const result = await execa(this.executablePath, args, {
      timeout: this.timeoutMs,
      reject: false,
      cancelSignal: request.signal,
      ...(this.cwd !== undefined ? { cwd: this.cwd } : {}),
    }).catch((error: unknown) => {
      throw this.toStartError(error);
    });

    if (result.isCanceled) {
      throw new BackendError('Backend call was cancelled', 'aborted');
    }

    if (result.timedOut) {
      throw new BackendError(
        `Backend call timed out after ${String(this.timeoutMs)}ms`,
        'timeout'
      );
    }

    if (result.exitCode === undefined) {
      // With reject: false a spawn failure is returned rather than thrown.
      throw this.toStartError(result);
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr;
      if (stderr.includes('command not found') || stderr.includes('ENOENT')) {
        throw new BackendError(
          `Backend command '${this.executablePath}' not found`,
          'not_found',
          stderr
        );
      }
      throw new BackendError(
        `Backend exited with code ${String(result.exitCode)}`,
        'exit_error',
        stderr
      );
    }

    return result.stdout;
  }

  private toStartError(error: unknown): BackendError {
    const cause = error instanceof Error ? error : new Error(String(error));
    if (errorCode(error) === 'ENOENT') {
      return new BackendError(
        `Backend command '${this.executablePath}' not found`,
        'not_found',
        undefined,
        cause
      );
    }
    return new BackendError(
      `Backend failed to start: ${cause.message}`,
      'spawn_error',
      undefined,
      cause
    );
  }
}

/**
 * Creates a CommandBackend from the `[agents]` config section.
 */
export function createCommandBackend(settings: AgentSettings, cwd?: string): CommandBackend {
  const options: CommandBackendOptions = {
    executablePath: settings.backend_command,
    baseArgs: settings.backend_args,
    temperatureFlag: settings.temperature_flag,
    // The policy decorator owns the deadline; this is a backstop for orphaned processes.
    timeoutMs: settings.timeout_ms * 2,
  };
  if (cwd !== undefined) {
    options.cwd = cwd;
  }
  return new CommandBackend(options);
}
