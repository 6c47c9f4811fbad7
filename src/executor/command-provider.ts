/**
 * Command Action Provider
 *
 * Runs one external command per action. The request goes to the command as
 * JSON on stdin; the command answers with an Ansible-style module result on
 * stdout:
 *
 *   { "changed": true, "failed": false, "unreachable": false,
 *     "reboot_required": false, "msg": "..." }
 *
 * Exit code 4 (or `unreachable: true`) means the target could not be contacted.
 */

import { execa } from 'execa';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ProviderConnectionError } from '../types/index.js';
import type { ProviderRequest, ProviderResponse, RemoteActionProvider } from './provider.js';

const log = createLogger('command-provider');

export const UNREACHABLE_EXIT_CODE = 4;

const moduleResultSchema = z.object({
  changed: z.boolean().default(false),
  failed: z.boolean().default(false),
  unreachable: z.boolean().default(false),
  reboot_required: z.boolean().default(false),
  msg: z.string().default(''),
});

/**
 * Outcome of one command invocation.
 */
export interface CommandOutput {
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  isCanceled: boolean;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: { input: string; timeoutMs: number; signal?: AbortSignal | undefined }
) => Promise<CommandOutput>;

/**
 * Default runner backed by execa.
 */
export const execaRunner: CommandRunner = async (command, args, options) => {
  const result = await execa(command, args, {
    input: options.input,
    timeout: options.timeoutMs,
    reject: false,
    ...(options.signal ? { cancelSignal: options.signal } : {}),
  });

  return {
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    timedOut: result.timedOut,
    isCanceled: result.isCanceled,
  };
};

export interface CommandProviderOptions {
  command: string;
  args?: string[];
  timeoutMs: number;
  runner?: CommandRunner;
}

export class CommandActionProvider implements RemoteActionProvider {
  readonly name = 'command';
  private readonly command: string;
  private readonly args: string[];
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: CommandProviderOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? execaRunner;
  }

  async execute(request: ProviderRequest): Promise<ProviderResponse> {
    const { target, action } = request;
    const input = JSON.stringify({
      target: {
        name: target.name,
        address: target.address,
        vars: target.vars,
        username: target.credentials.username,
        password: target.credentials.password,
      },
      action: {
        name: action.name,
        params: action.params,
      },
    });

    log.debug({ target: target.name, action: action.name, command: this.command }, 'Running action command');

    const output = await this.runner(this.command, [...this.args, action.name], {
      input,
      timeoutMs: this.timeoutMs,
      signal: request.signal,
    });

    if (output.isCanceled) {
      return { success: false, changed: false, rebootRequired: false, diagnostic: 'cancelled' };
    }

    if (output.timedOut) {
      return {
        success: false,
        changed: false,
        rebootRequired: false,
        diagnostic: `timed out after ${this.timeoutMs}ms`,
      };
    }

    const parsed = this.parseOutput(output.stdout);

    if (output.exitCode === UNREACHABLE_EXIT_CODE || parsed?.unreachable === true) {
      throw new ProviderConnectionError(
        target.name,
        parsed?.msg || output.stderr.trim() || `${target.address} is unreachable`
      );
    }

    if (parsed === null) {
      const diagnostic =
        output.exitCode === 0
          ? 'provider command produced no valid result'
          : output.stderr.trim() || `provider command exited with code ${String(output.exitCode)}`;
      return { success: false, changed: false, rebootRequired: false, diagnostic };
    }

    const success = output.exitCode === 0 && !parsed.failed;
    return {
      success,
      changed: parsed.changed,
      rebootRequired: parsed.reboot_required,
      diagnostic: parsed.msg || (success ? '' : output.stderr.trim()),
    };
  }

  /**
   * Module results are the last JSON line of stdout; anything before it is
   * treated as command chatter.
   */
  private parseOutput(stdout: string): z.infer<typeof moduleResultSchema> | null {
    const lines = stdout.trim().split('\n').filter((line) => line.trim().length > 0);
    const last = lines[lines.length - 1];
    if (last === undefined) {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(last);
    } catch (err) {
      log.warn({ err, line: last.slice(0, 200) }, 'Provider output is not JSON');
      return null;
    }

    const result = moduleResultSchema.safeParse(json);
    if (!result.success) {
      log.warn({ issues: result.error.issues }, 'Provider output does not match module result');
      return null;
    }
    return result.data;
  }
}
