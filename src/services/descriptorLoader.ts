/**
 * Descriptor set loader
 * Runs `buf build` over a directory of proto files and reads back the JSON FileDescriptorSet
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import { FileDescriptorSetJson, fileDescriptorSetSchema } from '../core/descriptorSchema';
import { DescriptorLoadError } from '../core/errors';
import { DEFAULT_CONFIG, MAX_OUTPUT_BUFFER } from '../utils/constants';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/utils';

export interface LoaderSettings {
  /** buf executable */
  path: string;
  /** Timeout for one build in milliseconds */
  timeout: number;
  /** Leave imported files out of the descriptor set */
  excludeImports: boolean;
}

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  cwd?: string;
  timeout: number;
  /** stdout limit in bytes, MAX_OUTPUT_BUFFER when unset */
  maxBuffer?: number;
}

export type ProcessRunner = (command: string, args: string[], options: RunOptions) => Promise<ProcessResult>;

const DEFAULT_SETTINGS: LoaderSettings = {
  path: DEFAULT_CONFIG.BUF_PATH,
  timeout: DEFAULT_CONFIG.LOAD_TIMEOUT_MS,
  excludeImports: false
};

/**
 * Run a command and collect its output. Spawns without a shell first and
 * retries once with `shell: true` when the spawn itself fails (PATH resolution).
 */
export const spawnRunner: ProcessRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const run = (useShell: boolean): void => {
      const proc = spawn(command, args, { cwd: options.cwd, shell: useShell });
      const maxBuffer = options.maxBuffer ?? MAX_OUTPUT_BUFFER;
      let stdout = '';
      let stdoutBytes = 0;
      let stderr = '';
      let timedOut = false;
      let failed = false;
      let overflowed = false;

      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGTERM');
      }, options.timeout);

      proc.stdout?.on('data', (data: Buffer) => {
        if (overflowed) {
          return;
        }
        stdoutBytes += data.length;
        if (stdoutBytes > maxBuffer) {
          overflowed = true;
          proc.kill('SIGTERM');
          return;
        }
        stdout += data.toString();
      });

      proc.stderr?.on('data', (data: Buffer) => {
        if (stderr.length < MAX_OUTPUT_BUFFER) {
          stderr += data.toString();
        }
      });

      proc.on('close', (code: number | null) => {
        clearTimeout(timer);
        if (failed) {
          return;
        }
        if (overflowed) {
          reject(new DescriptorLoadError(`${command} output exceeded the ${maxBuffer} byte buffer`, stderr, code));
          return;
        }
        resolve({ code, stdout, stderr, timedOut });
      });

      proc.on('error', (error: Error) => {
        clearTimeout(timer);
        failed = true;
        if (!useShell) {
          run(true);
        } else {
          reject(new DescriptorLoadError(`Failed to run ${command}: ${error.message}`, stderr));
        }
      });
    };

    run(false);
  });

/**
 * Validate parsed JSON as a descriptor set
 * @throws DescriptorLoadError when the value does not match the descriptor schema
 */
export function parseDescriptorSet(raw: unknown): FileDescriptorSetJson {
  const result = fileDescriptorSetSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new DescriptorLoadError(`Invalid descriptor set: ${issues}`);
  }
  return result.data;
}

export class DescriptorLoader {
  private settings: LoaderSettings;

  constructor(settings: Partial<LoaderSettings> = {}, private readonly runner: ProcessRunner = spawnRunner) {
    this.settings = { ...DEFAULT_SETTINGS, ...settings };
  }

  updateSettings(settings: Partial<LoaderSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }

  getSettings(): Readonly<LoaderSettings> {
    return this.settings;
  }

  buildArgs(inputDir: string): string[] {
    const args = ['build', inputDir, '--as-file-descriptor-set', '-o', '-#format=json'];
    if (this.settings.excludeImports) {
      args.push('--exclude-imports');
    }
    return args;
  }

  /**
   * Build and parse the descriptor set of every proto file under a directory
   * @throws DescriptorLoadError when the directory is missing, buf fails, or the output is not a descriptor set
   */
  async load(inputDir: string): Promise<FileDescriptorSetJson> {
    if (!inputDir || !fs.existsSync(inputDir) || !fs.statSync(inputDir).isDirectory()) {
      throw new DescriptorLoadError(`The directory ${inputDir} passed in does not exist. Please check the path.`);
    }

    const args = this.buildArgs(inputDir);
    const startTime = Date.now();
    logger.debugWithContext('Building descriptor set', {
      operation: 'loadDescriptorSet',
      file: inputDir,
      command: `${this.settings.path} ${args.join(' ')}`
    });

    const result = await this.runner(this.settings.path, args, { cwd: inputDir, timeout: this.settings.timeout });

    if (result.timedOut) {
      throw new DescriptorLoadError(
        `${this.settings.path} timed out after ${this.settings.timeout}ms while building ${inputDir}`,
        result.stderr,
        result.code
      );
    }

    if (result.code !== 0) {
      logger.errorWithContext('Descriptor set build failed', {
        operation: 'loadDescriptorSet',
        file: inputDir,
        exitCode: result.code,
        stderr: result.stderr.trim()
      });
      throw new DescriptorLoadError(
        `${this.settings.path} exited with code ${result.code} while building ${inputDir}`,
        result.stderr,
        result.code
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch (error) {
      throw new DescriptorLoadError(`Descriptor set output is not valid JSON: ${getErrorMessage(error)}`, result.stderr, result.code);
    }

    const descriptorSet = parseDescriptorSet(raw);
    logger.verboseWithContext('Descriptor set loaded', {
      operation: 'loadDescriptorSet',
      file: inputDir,
      duration: Date.now() - startTime,
      files: descriptorSet.file?.length ?? 0
    });
    return descriptorSet;
  }
}
