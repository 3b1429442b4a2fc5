/**
 * YOLO detector running in a long-lived Python worker.
 *
 * The worker loads the model once and then answers newline-delimited JSON:
 *   Request:  {"id": 1, "image": "<base64 PNG>"}
 *   Response: {"id": 1, "detections": [{"class_id": 9, "box": [x1, y1, x2, y2], "confidence": 0.8}]}
 *   Error:    {"id": 1, "error": "..."}
 * and announces itself with {"ready": true} once the model is loaded.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { existsSync } from 'node:fs';
import path from 'node:path';
import * as readline from 'node:readline';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { SolverError } from './errors.js';
import { silentLogger } from './logger.js';
import type { Detection, Logger, ObjectDetector } from './types.js';

const WireDetectionSchema = z.object({
  class_id: z.number().int().min(0),
  box: z.tuple([z.number(), z.number(), z.number(), z.number()]),
  confidence: z.number().min(0).max(1).optional(),
});

const WorkerMessageSchema = z.union([
  z.object({ ready: z.literal(true) }),
  z.object({ id: z.number().int(), detections: z.array(WireDetectionSchema) }),
  z.object({ id: z.number().int(), error: z.string() }),
]);

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

const ReplyIdSchema = z.object({ id: z.number().int() });

/**
 * One line of worker output: a protocol message, or a reply to request `id`
 * that does not match the protocol.
 */
export type WorkerLine =
  | { kind: 'message'; message: WorkerMessage }
  | { kind: 'invalid'; id: number; error: z.ZodError };

/** Parse one line of worker output. Returns null for lines that are not protocol JSON (model banners). */
export function parseWorkerLine(line: string): WorkerLine | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) return null;
  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    return null;
  }
  const parsed = WorkerMessageSchema.safeParse(json);
  if (parsed.success) return { kind: 'message', message: parsed.data };
  const reply = ReplyIdSchema.safeParse(json);
  return reply.success ? { kind: 'invalid', id: reply.data.id, error: parsed.error } : null;
}

export function toDetections(wire: ReadonlyArray<z.infer<typeof WireDetectionSchema>>): Detection[] {
  return wire.map((d) => ({ classId: d.class_id, box: [...d.box], confidence: d.confidence }));
}

export interface YoloDetectorOptions {
  modelPath: string;
  pythonPath?: string;
  scriptPath?: string;
  /** Per-image timeout; model load time is covered by startTimeoutMs. */
  timeoutMs?: number;
  startTimeoutMs?: number;
  logger?: Logger;
}

interface Pending {
  resolve: (detections: Detection[]) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

const here = path.dirname(fileURLToPath(import.meta.url));

function defaultScriptPath(): string {
  const candidates = [
    path.join(here, '..', 'scripts', 'yolo_worker.py'),
    path.join(process.cwd(), 'scripts', 'yolo_worker.py'),
  ];
  return candidates.find((p) => existsSync(p)) ?? candidates[0];
}

function defaultPythonPath(): string {
  const venv = process.platform === 'win32'
    ? path.join(process.cwd(), '.venv', 'Scripts', 'python.exe')
    : path.join(process.cwd(), '.venv', 'bin', 'python3');
  if (existsSync(venv)) return venv;
  return process.platform === 'win32' ? 'python' : 'python3';
}

export class YoloProcessDetector implements ObjectDetector {
  private child: ChildProcessWithoutNullStreams | null = null;
  private ready: Promise<void> | null = null;
  private readonly pending = new Map<number, Pending>();
  private seq = 0;
  private readonly log: Logger;

  constructor(private readonly opts: YoloDetectorOptions) {
    this.log = opts.logger ?? silentLogger;
  }

  /** Spawn the worker and wait for the model to load. Safe to call more than once. */
  start(): Promise<void> {
    if (this.ready) return this.ready;

    const python = this.opts.pythonPath ?? defaultPythonPath();
    const script = this.opts.scriptPath ?? defaultScriptPath();
    const startTimeoutMs = this.opts.startTimeoutMs ?? 60_000;
    this.log.info(`[Detector] Starting ${python} ${script}`);

    const child = spawn(python, [script, '--model', this.opts.modelPath], { stdio: ['pipe', 'pipe', 'pipe'] });
    this.child = child;

    const ready = new Promise<void>((resolve, reject) => {
      const startTimer = setTimeout(() => {
        this.discard(child);
        child.kill();
        reject(new SolverError(`Detector worker did not become ready within ${startTimeoutMs}ms`));
      }, startTimeoutMs);

      const rl = readline.createInterface({ input: child.stdout, terminal: false });
      rl.on('line', (line: string) => {
        const parsed = parseWorkerLine(line);
        if (!parsed) return;
        if (parsed.kind === 'invalid') {
          const err = new SolverError(`Detector sent an invalid reply to request ${parsed.id}`, 'transient', {
            cause: parsed.error,
          });
          this.failRequest(parsed.id, err);
          return;
        }
        const msg = parsed.message;
        if ('ready' in msg) {
          clearTimeout(startTimer);
          resolve();
          return;
        }
        this.settle(msg);
      });

      child.stderr.on('data', (data: Buffer) => this.log.debug(`[Detector] ${data.toString().trimEnd()}`));

      // EPIPE when the worker dies with requests still being written.
      child.stdin.on('error', (err) => {
        this.log.warn(`[Detector] Worker input closed: ${err.message}`);
        if (this.child === child) this.failAll(new SolverError('Detector worker stopped reading requests', 'transient', { cause: err }));
      });

      child.on('error', (err) => {
        clearTimeout(startTimer);
        this.discard(child);
        reject(new SolverError(`Detector worker failed to start: ${err.message}`, 'transient', { cause: err }));
      });

      child.on('close', (code) => {
        clearTimeout(startTimer);
        const err = new SolverError(`Detector worker exited with code ${code}`);
        reject(err);
        if (this.child !== child) return;
        this.discard(child);
        this.failAll(err);
      });
    });
    this.ready = ready;
    return ready;
  }

  async detect(png: Buffer): Promise<Detection[]> {
    await this.start();
    const child = this.child;
    if (!child) throw new SolverError('Detector worker is not running');

    const id = ++this.seq;
    return new Promise<Detection[]>((resolve, reject) => {
      if (!child.stdin.writable) {
        reject(new SolverError('Detector worker is not accepting requests'));
        return;
      }
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new SolverError(`Detection ${id} timed out`));
      }, this.opts.timeoutMs ?? 30_000);
      this.pending.set(id, { resolve, reject, timer });
      child.stdin.write(JSON.stringify({ id, image: png.toString('base64') }) + '\n');
    });
  }

  async close(): Promise<void> {
    const child = this.child;
    if (!child) return;
    await new Promise<void>((resolve) => {
      child.once('close', () => resolve());
      child.stdin.end();
    });
  }

  /** Forget `child` if it is the current worker, so the next call spawns a new one. */
  private discard(child: ChildProcessWithoutNullStreams): void {
    if (this.child !== child) return;
    this.child = null;
    this.ready = null;
  }

  private failRequest(id: number, err: Error): void {
    const entry = this.pending.get(id);
    if (!entry) return;
    this.pending.delete(id);
    clearTimeout(entry.timer);
    entry.reject(err);
  }

  private settle(msg: Exclude<WorkerMessage, { ready: true }>): void {
    const entry = this.pending.get(msg.id);
    if (!entry) return;
    this.pending.delete(msg.id);
    clearTimeout(entry.timer);
    if ('error' in msg) {
      entry.reject(new SolverError(`Detector error: ${msg.error}`));
    } else {
      entry.resolve(toDetections(msg.detections));
    }
  }

  private failAll(err: Error): void {
    for (const [id, entry] of this.pending) {
      clearTimeout(entry.timer);
      entry.reject(err);
      this.pending.delete(id);
    }
  }
}
