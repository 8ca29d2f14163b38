import { spawn } from 'child_process';
import { createServiceLogger } from './logger';

const log = createServiceLogger('android-cli');

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export interface RunResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
}

/**
 * Adds the platform-tools directory of ANDROID_SDK_ROOT (when set) to PATH
 */
const getAndroidEnv = (customEnv?: NodeJS.ProcessEnv): NodeJS.ProcessEnv => {
  const homeDir = process.env.HOME || '/root';
  const sdkRoot = process.env.ANDROID_SDK_ROOT?.replace(/^~/, homeDir);
  const pathAdditions = sdkRoot ? `:${sdkRoot}/platform-tools` : '';

  return {
    ...process.env,
    ...customEnv,
    PATH: `${process.env.PATH ?? ''}${pathAdditions}`
  };
};

/**
 * Spawn a platform tool and collect its output. On timeout the child is
 * killed and the result is flagged `timedOut`; the device-side operation
 * may still complete.
 */
export const runCommand = (
  executable: string,
  args: string[],
  { env, timeoutMs }: RunOptions = {}
): Promise<RunResult> => {
  return new Promise((resolve, reject) => {
    const startedAt = Date.now();
    const child = spawn(executable, args, {
      env: getAndroidEnv(env),
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => {
      if (timer) clearTimeout(timer);
      reject(error);
    });

    child.on('close', (code: number | null) => {
      if (timer) clearTimeout(timer);
      resolve({ code, stdout, stderr, timedOut, durationMs: Date.now() - startedAt });
    });

    if (timeoutMs) {
      timer = setTimeout(() => {
        timedOut = true;
        log.warn('command_timeout', 'Command timed out; terminating', undefined, { executable, args, timeoutMs });
        child.kill('SIGKILL');
      }, timeoutMs);
      timer.unref();
    }
  });
};

const binaryOverrides: { adb?: string; fastboot?: string } = {};

/** Pin the platform-tool executables; unset entries fall back to ADB / FASTBOOT env vars */
export const configureBinaries = (paths: { adb?: string; fastboot?: string }): void => {
  Object.assign(binaryOverrides, paths);
};

export const adbBinary = (): string => binaryOverrides.adb ?? process.env.ADB ?? 'adb';
export const fastbootBinary = (): string => binaryOverrides.fastboot ?? process.env.FASTBOOT ?? 'fastboot';

export const adb = (serial: string, args: string[], options?: RunOptions) =>
  runCommand(adbBinary(), ['-s', serial, ...args], options);

export const adbShell = (serial: string, command: string, options?: RunOptions) =>
  adb(serial, ['shell', command], options);

export const adbGetProp = (serial: string, prop: string, options?: RunOptions) =>
  adb(serial, ['shell', 'getprop', prop], options);

export const fastboot = (serial: string, args: string[], options?: RunOptions) =>
  runCommand(fastbootBinary(), ['-s', serial, ...args], options);

/**
 * Split a command line on whitespace, keeping double-quoted segments together
 */
export const splitArgs = (commandLine: string): string[] => {
  const args: string[] = [];
  const pattern = /"([^"]*)"|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(commandLine)) !== null) {
    args.push(match[1] ?? match[2]);
  }
  return args;
};
