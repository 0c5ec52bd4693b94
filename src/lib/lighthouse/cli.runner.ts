/**
 * Lighthouse CLI Runner
 * Spawns the lighthouse binary and reads the JSON report from stdout
 */

import { spawn } from 'child_process';
import { env } from '../../config/env';
import { TimeoutError, withTimeout } from '../utils/async';
import {
  LighthouseErrorKind,
  LighthouseReport,
  lighthouseReportSchema,
  LighthouseRunError,
  LighthouseRunner,
  LighthouseRunOptions,
} from './lighthouse.types';

const VERSION_TIMEOUT_MS = 10000;

interface CommandOutput {
  code: number | null;
  stdout: string;
  stderr: string;
}

function runCommand(command: string, args: string[], timeoutMs: number): Promise<CommandOutput> {
  const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

  const commandPromise = new Promise<CommandOutput>((resolve, reject) => {
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer | string) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });

    child.on('error', reject);

    child.on('close', (code) => {
      resolve({ code, stdout, stderr });
    });
  });

  return withTimeout(commandPromise, timeoutMs).catch((error: unknown) => {
    if (error instanceof TimeoutError) {
      child.kill('SIGKILL');
    }
    throw error;
  });
}

/**
 * Validate raw stdout against the report schema
 */
export function parseLighthouseReport(raw: string): LighthouseReport {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new LighthouseRunError(
      LighthouseErrorKind.INVALID_OUTPUT,
      `Could not parse Lighthouse output: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = lighthouseReportSchema.safeParse(parsed);
  if (!result.success) {
    throw new LighthouseRunError(LighthouseErrorKind.INVALID_OUTPUT, `Unexpected Lighthouse report shape: ${result.error.message}`);
  }
  return result.data;
}

export class CliLighthouseRunner implements LighthouseRunner {
  constructor(private readonly binary: string = env.LIGHTHOUSE_PATH) {}

  async version(): Promise<string | null> {
    try {
      const output = await runCommand(this.binary, ['--version'], VERSION_TIMEOUT_MS);
      return output.code === 0 ? output.stdout.trim() : null;
    } catch (error) {
      console.warn(`Lighthouse CLI unavailable (${this.binary}):`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  async run(url: string, options: LighthouseRunOptions): Promise<LighthouseReport> {
    const args = [
      url,
      '--output=json',
      '--output-path=stdout',
      `--only-categories=${options.categories.join(',')}`,
      '--chrome-flags=--headless',
      '--quiet',
    ];

    let output: CommandOutput;
    try {
      output = await runCommand(this.binary, args, options.timeoutMs);
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new LighthouseRunError(LighthouseErrorKind.TIMEOUT, 'Lighthouse audit timed out');
      }
      throw new LighthouseRunError(
        LighthouseErrorKind.FAILED,
        `Lighthouse error: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (output.code !== 0) {
      throw new LighthouseRunError(LighthouseErrorKind.FAILED, `Lighthouse failed: ${output.stderr}`);
    }

    return parseLighthouseReport(output.stdout);
  }
}

export const lighthouseRunner = new CliLighthouseRunner();
