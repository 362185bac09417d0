/**
 * Event source backed by a capture helper process that speaks the fixed
 * record protocol from record.ts: event records arrive on `input`, block
 * commands are written to `commands`.
 */

import type { Readable, Writable } from 'node:stream';

import { SourceClosedError, describeError } from '../errors.js';
import { raceAbort, untilAborted, type EventSource } from '../event-source.js';
import { createConsoleLogger, type Logger } from '../logger.js';
import { EVENT_RECORD_SIZE, decodeEventRecord, encodeBlockCommand } from '../record.js';
import type { AccessEvent } from '../types.js';

export interface RecordStreamSourceOptions {
  logger?: Logger;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  throw new TypeError(`unexpected chunk type: ${typeof chunk}`);
}

export class RecordStreamSource implements EventSource {
  private readonly chunks: AsyncIterator<unknown>;
  private readonly logger: Logger;
  private readonly sent = new Set<number>();
  private pending: Promise<IteratorResult<unknown>> | null = null;
  private buffered: Buffer = Buffer.alloc(0);
  private ended = false;
  private closed = false;
  private commandError: Error | null = null;

  constructor(
    private readonly input: Readable,
    private readonly commands: Writable,
    options: RecordStreamSourceOptions = {}
  ) {
    this.chunks = input[Symbol.asyncIterator]();
    this.logger = options.logger ?? createConsoleLogger();
    // Once the command stream fails, every later block() rejects with its error.
    commands.on('error', (err: Error) => {
      this.commandError ??= err;
      this.logger.error(`block command stream: ${describeError(err)}`);
    });
  }

  async next(signal: AbortSignal): Promise<AccessEvent> {
    for (;;) {
      if (this.closed) throw new SourceClosedError();
      signal.throwIfAborted();

      if (this.buffered.length >= EVENT_RECORD_SIZE) {
        const record = this.buffered.subarray(0, EVENT_RECORD_SIZE);
        this.buffered = this.buffered.subarray(EVENT_RECORD_SIZE);
        return decodeEventRecord(record);
      }

      if (this.ended) return untilAborted(signal);

      // An abort can win the race while a read is outstanding; keep the
      // read so its chunk is not lost on the next call.
      this.pending ??= this.chunks.next();
      let result: IteratorResult<unknown>;
      try {
        result = await raceAbort(this.pending, signal);
      } catch (err: unknown) {
        if (signal.aborted) throw err;
        this.pending = null;
        this.ended = true;
        throw new Error(`reading event stream: ${describeError(err)}`, { cause: err });
      }
      this.pending = null;

      if (result.done) {
        this.ended = true;
        if (this.buffered.length > 0) {
          this.logger.warn(
            `event stream ended with a partial record (${this.buffered.length} bytes), discarding it`
          );
          this.buffered = Buffer.alloc(0);
        }
        continue;
      }
      this.buffered = Buffer.concat([this.buffered, toBuffer(result.value)]);
    }
  }

  async block(actorId: number): Promise<void> {
    if (this.closed) throw new SourceClosedError();
    if (this.sent.has(actorId)) return;
    if (this.commandError) throw this.commandError;
    await new Promise<void>((resolve, reject) => {
      this.commands.write(encodeBlockCommand(actorId), (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    this.sent.add(actorId);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.input.destroy();
    await new Promise<void>((resolve) => {
      this.commands.end(() => resolve());
    });
  }
}
