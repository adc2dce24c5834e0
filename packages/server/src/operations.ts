import { randomUUID } from 'node:crypto';
import { lstatSync, statSync } from 'node:fs';
import { dirname, isAbsolute } from 'node:path';
import { z } from 'zod';
import {
  ListenerSet,
  deliverInline,
  type Deliver,
  type Listener,
  type OperationError,
  type OperationKind,
  type OperationProgress,
  type OperationRequest,
  type OperationResult,
} from '@filework/shared';
import { extractZip } from './archive.js';
import { InvalidRequestError, toOperationError } from './errors.js';
import type { FileSystem } from './fs.js';
import { copyInto, deleteEntry, moveInto } from './transfer.js';

const AbsolutePathSchema = z
  .string()
  .min(1)
  .refine((path) => isAbsolute(path), 'Path must be absolute');

const SourcePathsSchema = z.array(AbsolutePathSchema).nonempty('At least one source path is required');

const OperationRequestSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.enum(['copy', 'move']),
    sourcePaths: SourcePathsSchema,
    destinationDir: AbsolutePathSchema,
  }),
  z
    .object({
      kind: z.literal('delete'),
      sourcePaths: SourcePathsSchema,
    })
    .strict('Delete takes no destination'),
  z.object({
    kind: z.literal('extract'),
    sourcePaths: SourcePathsSchema,
    destinationDir: AbsolutePathSchema.optional(),
  }),
]);

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'request'}: ${issue.message}`)
    .join('; ');
}

function assertDirectory(path: string): void {
  const info = statSync(path, { throwIfNoEntry: false });
  if (!info) {
    throw new InvalidRequestError(`Destination does not exist: ${path}`);
  }
  if (!info.isDirectory()) {
    throw new InvalidRequestError(`Destination is not a directory: ${path}`);
  }
}

// Synchronous: a bad request never produces a handle
export function validateOperationRequest(input: unknown): OperationRequest {
  const parsed = OperationRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError(formatIssues(parsed.error));
  }
  const request = parsed.data;

  for (const path of request.sourcePaths) {
    const info = lstatSync(path, { throwIfNoEntry: false });
    if (!info) {
      throw new InvalidRequestError(`Source does not exist: ${path}`);
    }
    if (request.kind === 'extract' && !info.isFile()) {
      throw new InvalidRequestError(`Archive is not a regular file: ${path}`);
    }
  }

  if (request.kind === 'copy' || request.kind === 'move') {
    assertDirectory(request.destinationDir);
  } else if (request.kind === 'extract' && request.destinationDir) {
    assertDirectory(request.destinationDir);
  }

  return request;
}

async function applyItem(request: OperationRequest, source: string, fs: FileSystem): Promise<void> {
  switch (request.kind) {
    case 'copy':
      await copyInto(source, request.destinationDir, fs);
      return;
    case 'move':
      await moveInto(source, request.destinationDir, fs);
      return;
    case 'delete':
      await deleteEntry(source, fs);
      return;
    case 'extract':
      await extractZip(source, request.destinationDir ?? dirname(source), fs);
      return;
  }
}

export type ExecutionEvent =
  | { type: 'progress'; progress: OperationProgress }
  | { type: 'complete'; result: OperationResult };

export async function* executeOperation(
  request: OperationRequest,
  fs: FileSystem,
  signal: AbortSignal
): AsyncGenerator<ExecutionEvent> {
  const totalCount = request.sourcePaths.length;
  const errors: OperationError[] = [];
  let completedCount = 0;

  for (const source of request.sourcePaths) {
    if (signal.aborted) break;

    try {
      await applyItem(request, source, fs);
    } catch (error) {
      const failure = toOperationError(source, error);
      console.warn(`[engine] ${request.kind} failed for ${source}: ${failure.message}`);
      errors.push(failure);
    }

    completedCount += 1;
    yield {
      type: 'progress',
      progress: { completedCount, totalCount, currentPath: source },
    };
  }

  const cancelled = completedCount < totalCount;
  if (cancelled) {
    console.log(`[engine] ${request.kind} cancelled after ${completedCount}/${totalCount}`);
  }
  yield { type: 'complete', result: { errors, cancelled } };
}

export interface OperationHandleOptions {
  fs: FileSystem;
  deliver?: Deliver;
}

export class OperationHandle {
  readonly id = randomUUID();
  readonly kind: OperationKind;
  readonly totalCount: number;
  readonly result: Promise<OperationResult>;

  private readonly controller = new AbortController();
  private readonly progressListeners: ListenerSet<OperationProgress>;
  private readonly completedListeners: ListenerSet<OperationResult>;
  private outcome: OperationResult | null = null;

  constructor(request: OperationRequest, options: OperationHandleOptions) {
    const deliver = options.deliver ?? deliverInline;
    this.kind = request.kind;
    this.totalCount = request.sourcePaths.length;
    this.progressListeners = new ListenerSet('engine', deliver);
    this.completedListeners = new ListenerSet('engine', deliver);

    const frozen = { ...request, sourcePaths: Object.freeze([...request.sourcePaths]) };
    // starts after the caller has had a chance to attach listeners
    this.result = Promise.resolve().then(() => this.run(frozen, options.fs));
  }

  get completed(): boolean {
    return this.outcome !== null;
  }

  onProgress(listener: Listener<OperationProgress>): this {
    this.progressListeners.add(listener);
    return this;
  }

  // late listeners get the stored result
  onCompleted(listener: Listener<OperationResult>): this {
    if (this.outcome) {
      this.completedListeners.deliverTo(listener, this.outcome);
    } else {
      this.completedListeners.add(listener);
    }
    return this;
  }

  cancel(): void {
    if (!this.outcome && !this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  private async run(request: OperationRequest, fs: FileSystem): Promise<OperationResult> {
    let outcome: OperationResult = { errors: [], cancelled: false };

    for await (const event of executeOperation(request, fs, this.controller.signal)) {
      if (event.type === 'progress') {
        this.progressListeners.emit(event.progress);
      } else {
        outcome = event.result;
      }
    }

    this.outcome = outcome;
    this.completedListeners.emit(outcome);
    this.progressListeners.clear();
    this.completedListeners.clear();
    return outcome;
  }
}

export function submitOperation(
  input: unknown,
  options: OperationHandleOptions
): OperationHandle {
  const request = validateOperationRequest(input);
  console.log(`[engine] Submitted ${request.kind} of ${request.sourcePaths.length} item(s)`);
  return new OperationHandle(request, options);
}
