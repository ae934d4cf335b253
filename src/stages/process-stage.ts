/**
 * Process-backed stages. Spawn a script or command as a child process, pass the
 * input payload and resources through the environment, capture output, parse
 * the result line and honour the abort signal.
 */

import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { createInterface } from 'node:readline';

import { z } from 'zod';

import { classifyFailure, TRANSIENT_EXIT_CODE } from '../pipeline/classify.js';
import { type ResourceBundle, toEnvironment } from '../pipeline/resources.js';
import {
  failure,
  skip,
  type Stage,
  type StageContext,
  type StageOutcome,
  type StageReport,
  success,
} from '../pipeline/stage.js';
import type {
  CommandStageDefinition,
  ScriptStageDefinition,
} from '../schemas/pipeline.js';
import type { StagePayload } from '../schemas/run.js';

/** Prefix of the machine-readable result line a process may print. */
export const RESULT_PREFIX = 'PIPELINE_RESULT:';

/** Grace period between SIGTERM and SIGKILL on abort. */
const KILL_GRACE_MS = 5000;

/** Command resolution result. */
export interface ResolvedCommand {
  /** Command to execute. */
  command: string;
  /** Arguments to pass to the command. */
  args: string[];
}

/** Outcome of a spawned process. */
export interface ProcessExit {
  /** Process exit code (null if killed or spawn error). */
  exitCode: number | null;
  /** Spawn error code, e.g. ENOENT. */
  spawnErrorCode: string | null;
  spawnError: string | null;
  /** Last N lines of stdout. */
  stdoutTail: string;
  /** Last N lines of stderr. */
  stderrTail: string;
  /** Last valid result line printed on stdout, wherever it appeared. */
  result: ProcessResult | null;
}

/** Ring buffer for capturing last N lines of output. */
class RingBuffer {
  private lines: string[] = [];

  constructor(private maxLines: number) {}

  append(line: string): void {
    this.lines.push(line);
    if (this.lines.length > this.maxLines) {
      this.lines.shift();
    }
  }

  getAll(): string {
    return this.lines.join('\n');
  }
}

const processResultSchema = z.object({
  status: z.enum(['success', 'skipped', 'failure']).optional(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  reason: z.string().optional(),
  retryable: z.boolean().optional(),
});

/** Result line reported by a process. */
export type ProcessResult = z.infer<typeof processResultSchema>;

/** Parse one stdout line as `PIPELINE_RESULT:{json}`. */
function parseLine(line: string): ProcessResult | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(RESULT_PREFIX)) return null;
  try {
    const result = processResultSchema.safeParse(
      JSON.parse(trimmed.slice(RESULT_PREFIX.length)),
    );
    return result.success ? result.data : null;
  } catch {
    // Not JSON; the line is treated as ordinary output.
    return null;
  }
}

/** Parse the last valid `PIPELINE_RESULT:{json}` line from stdout. */
export function parseResultLine(stdout: string): ProcessResult | null {
  let parsed: ProcessResult | null = null;
  for (const line of stdout.split('\n')) {
    parsed = parseLine(line) ?? parsed;
  }
  return parsed;
}

/** Resolve the command and arguments for a script based on its file extension. */
export function resolveCommand(script: string): ResolvedCommand {
  const ext = extname(script).toLowerCase();

  switch (ext) {
    case '.py':
      return { command: 'python3', args: [script] };
    case '.sh':
      return { command: 'bash', args: [script] };
    case '.ps1':
      return {
        command: 'powershell.exe',
        args: ['-NoProfile', '-File', script],
      };
    case '.cmd':
    case '.bat':
      return { command: 'cmd.exe', args: ['/c', script] };
    default:
      // .js, .mjs, .cjs, or anything else: run with node
      return { command: process.execPath, args: [script] };
  }
}

/**
 * Spawn a process and capture its output. Aborting the signal sends SIGTERM,
 * then SIGKILL after a grace period.
 */
export function spawnProcess(
  spec: ResolvedCommand & { cwd?: string; env: Record<string, string> },
  signal: AbortSignal,
): Promise<ProcessExit> {
  return new Promise((resolvePromise) => {
    const stdoutBuffer = new RingBuffer(100);
    const stderrBuffer = new RingBuffer(100);

    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let killHandle: NodeJS.Timeout | null = null;
    const onAbort = (): void => {
      child.kill('SIGTERM');
      killHandle = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
      killHandle.unref();
    };
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    // Whole lines only; a line may span several pipe chunks.
    let result: ProcessResult | null = null;
    createInterface({ input: child.stdout, crlfDelay: Infinity }).on(
      'line',
      (line: string) => {
        result = parseLine(line) ?? result;
        if (line.trim()) stdoutBuffer.append(line);
      },
    );
    createInterface({ input: child.stderr, crlfDelay: Infinity }).on(
      'line',
      (line: string) => {
        if (line.trim()) stderrBuffer.append(line);
      },
    );

    const settle = (
      exit: Omit<ProcessExit, 'stdoutTail' | 'stderrTail' | 'result'>,
    ): void => {
      signal.removeEventListener('abort', onAbort);
      if (killHandle) clearTimeout(killHandle);
      resolvePromise({
        ...exit,
        stdoutTail: stdoutBuffer.getAll(),
        stderrTail: stderrBuffer.getAll(),
        result,
      });
    };

    child.on('close', (exitCode) => {
      settle({ exitCode, spawnErrorCode: null, spawnError: null });
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      settle({
        exitCode: null,
        spawnErrorCode: err.code ?? null,
        spawnError: err.message,
      });
    });
  });
}

/** Map a process exit onto a stage outcome. */
export function interpretExit(
  exit: ProcessExit,
  optional: boolean,
  command: string,
): StageOutcome {
  if (exit.spawnError !== null) {
    if (exit.spawnErrorCode === 'ENOENT') {
      const message = `Command not found: ${command}`;
      return optional ? skip(message) : failure('stage-not-found', message);
    }
    return failure(classifyFailure(exit.spawnError), exit.spawnError);
  }

  const { result } = exit;

  if (exit.exitCode === 0) {
    if (result?.status === 'skipped') {
      return skip(result.reason ?? 'Stage reported skipped');
    }
    if (result?.status === 'failure') {
      const message = result.error ?? 'Stage reported failure';
      return failure(result.retryable ? 'retryable' : 'fatal', message);
    }
    return success(result?.data);
  }

  const message =
    result?.error ??
    (exit.stderrTail ||
      (exit.exitCode === null
        ? 'Process terminated by signal'
        : `Exit code ${String(exit.exitCode)}`));
  const transient =
    exit.exitCode === TRANSIENT_EXIT_CODE || result?.retryable === true;
  return failure(transient ? 'retryable' : classifyFailure(message), message);
}

/** Environment passed to every process stage. */
function stageEnvironment(
  input: StagePayload,
  resources: ResourceBundle,
  context: StageContext,
  stageName: string,
): Record<string, string> {
  return {
    ...toEnvironment(resources),
    PIPELINE_INPUT: JSON.stringify(input),
    PIPELINE_NAME: context.pipelineName,
    PIPELINE_RUN_ID: String(context.runId),
    PIPELINE_STAGE: stageName,
  };
}

function report(outcome: StageOutcome, exit: ProcessExit): StageReport {
  return { outcome, stdoutTail: exit.stdoutTail, stderrTail: exit.stderrTail };
}

/** Create a stage that runs a script file. A missing script is `stage-not-found` (or a skip when optional). */
export function createScriptStage(definition: ScriptStageDefinition): Stage {
  const frozen = Object.freeze({ ...definition });

  return {
    definition: frozen,

    async run(input, resources, context): Promise<StageReport> {
      const script = resolve(frozen.script);
      if (!existsSync(script)) {
        const message = `Script not found: ${script}`;
        context.logger.warn({ stage: frozen.name, script }, message);
        return {
          outcome: frozen.optional
            ? skip(message)
            : failure('stage-not-found', message),
        };
      }

      const { command, args } = frozen.interpreter
        ? { command: frozen.interpreter, args: [script] }
        : resolveCommand(script);

      const exit = await spawnProcess(
        {
          command,
          args,
          env: stageEnvironment(input, resources, context, frozen.name),
        },
        context.signal,
      );
      return report(interpretExit(exit, frozen.optional, command), exit);
    },
  };
}

/** Create a stage that runs an arbitrary command, e.g. a SQL transformation tool. */
export function createCommandStage(definition: CommandStageDefinition): Stage {
  const frozen = Object.freeze({ ...definition, args: [...definition.args] });

  return {
    definition: frozen,

    async run(input, resources, context): Promise<StageReport> {
      const cwd = frozen.cwd ? resolve(frozen.cwd) : undefined;
      if (cwd && !existsSync(cwd)) {
        const message = `Working directory not found: ${cwd}`;
        return {
          outcome: frozen.optional
            ? skip(message)
            : failure('stage-not-found', message),
        };
      }

      const exit = await spawnProcess(
        {
          command: frozen.command,
          args: [...frozen.args],
          cwd,
          env: stageEnvironment(input, resources, context, frozen.name),
        },
        context.signal,
      );
      return report(interpretExit(exit, frozen.optional, frozen.command), exit);
    },
  };
}
