/**
 * Newline-delimited JSON-RPC transport with strict request/response
 * alternation.
 *
 * Each request line is handed to the protocol layer and the next line is
 * not read until the response carrying the same id has been written. A
 * line that is not valid JSON-RPC gets one error response and the session
 * keeps reading.
 */

import { randomUUID } from 'node:crypto';
import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ErrorCode, JSONRPCMessageSchema, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { errorMessage } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';

type RequestId = string | number;

interface PendingResponse {
  id: RequestId;
  resolve: () => void;
}

function isRequestId(value: unknown): value is RequestId {
  return typeof value === 'string' || typeof value === 'number';
}

/**
 * Id of a request or response message, if it has one.
 */
function messageId(message: JSONRPCMessage): RequestId | undefined {
  return 'id' in message && isRequestId(message.id) ? message.id : undefined;
}

/**
 * Id of a line that parsed as JSON but not as JSON-RPC, or a fresh one.
 */
function recoverId(value: unknown): RequestId {
  if (typeof value === 'object' && value !== null && 'id' in value && isRequestId(value.id)) {
    return value.id;
  }
  return randomUUID();
}

export class LineTransport implements Transport {
  onclose?: Transport['onclose'];
  onerror?: Transport['onerror'];
  onmessage?: Transport['onmessage'];

  private lines?: readline.Interface;
  private loop?: Promise<void>;
  private pending?: PendingResponse;
  private inFlight: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout
  ) {}

  async start(): Promise<void> {
    if (this.lines) {
      throw new Error('LineTransport already started');
    }

    this.lines = readline.createInterface({ input: this.input, crlfDelay: Infinity });
    this.loop = this.readLoop(this.lines);
  }

  /**
   * Resolves once the input has ended or the transport has closed.
   */
  finished(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  async send(message: JSONRPCMessage): Promise<void> {
    await this.writeLine(message);

    const id = messageId(message);
    const isResponse = 'result' in message || 'error' in message;
    if (this.pending && isResponse && id === this.pending.id) {
      const { resolve } = this.pending;
      this.pending = undefined;
      resolve();
    }
  }

  /**
   * Stop reading new lines. A response already in flight is written
   * before `onclose` fires.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.lines?.close();
    await this.inFlight;
    this.onclose?.();
  }

  private async readLoop(lines: readline.Interface): Promise<void> {
    try {
      for await (const line of lines) {
        if (this.closed) break;
        if (line.trim() === '') continue;

        this.inFlight = this.handleLine(line);
        await this.inFlight;
      }
    } catch (error) {
      this.onerror?.(error instanceof Error ? error : new Error(String(error)));
    }

    if (!this.closed) {
      this.closed = true;
      this.onclose?.();
    }
  }

  private async handleLine(line: string): Promise<void> {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      await this.rejectLine(randomUUID(), `Parse error: ${errorMessage(error)}`);
      return;
    }

    const parsed = JSONRPCMessageSchema.safeParse(value);
    if (!parsed.success) {
      await this.rejectLine(recoverId(value), 'Invalid JSON-RPC message');
      return;
    }

    const message = parsed.data;
    const handler = this.onmessage;
    const id = messageId(message);
    if (!handler) {
      await this.rejectLine(id ?? randomUUID(), 'Transport is not connected');
      return;
    }

    // Notifications and client responses get no reply.
    if (id === undefined || !('method' in message)) {
      handler(message);
      return;
    }

    const responded = new Promise<void>(resolve => {
      this.pending = { id, resolve };
    });
    handler(message);
    await responded;
  }

  private async rejectLine(id: RequestId, message: string): Promise<void> {
    metrics.increment(MetricNames.PROTOCOL_ERRORS);
    logger.warn('Rejected protocol line', { id, error: message });

    await this.writeLine({
      jsonrpc: '2.0',
      id,
      error: { code: ErrorCode.InternalError, message }
    });
  }

  private writeLine(payload: unknown): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(`${JSON.stringify(payload)}\n`, error => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
}
