import WebSocket from 'ws';
import { LoadTestError } from '../errors.js';
import type { ExecutionContext, Workload, WorkloadResult } from '../types.js';

export interface SocketConnection {
  /** Resolves with the next reply when `expectReply` is set, once the frame is flushed otherwise. */
  send(message: string, expectReply: boolean, signal?: AbortSignal): Promise<string | void>;
  close(): Promise<void>;
}

export type SocketConnector = (url: string) => Promise<SocketConnection>;

export interface SocketWorkloadOptions {
  name: string;
  url: string;
  message: string;
  expectReply?: boolean;
  weight?: number;
  connect?: SocketConnector;
}

interface PendingReply {
  resolve(reply: string): void;
  reject(error: Error): void;
  cancelled: boolean;
}

function decode(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Opens one WebSocket and pairs replies with requests in send order.
 * A request aborted while waiting keeps its place so later replies stay aligned.
 */
export async function connectWebSocket(url: string): Promise<SocketConnection> {
  const ws = new WebSocket(url);
  const pending: PendingReply[] = [];

  await new Promise<void>((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', (error) => reject(error));
  });

  ws.on('message', (data) => {
    const next = pending.shift();
    if (next && !next.cancelled) next.resolve(decode(data));
  });
  ws.on('close', (code) => {
    for (const entry of pending.splice(0)) {
      if (!entry.cancelled) entry.reject(new LoadTestError(`Socket closed with code ${code}`, 'SOCKET_CLOSED'));
    }
  });
  ws.on('error', (error) => {
    for (const entry of pending.splice(0)) {
      if (!entry.cancelled) entry.reject(error);
    }
  });

  return {
    send(message, expectReply, signal) {
      if (ws.readyState !== WebSocket.OPEN) {
        return Promise.reject(new LoadTestError('Socket is not open', 'SOCKET_CLOSED'));
      }

      if (!expectReply) {
        return new Promise<void>((resolve, reject) => {
          ws.send(message, (error) => (error ? reject(error) : resolve()));
        });
      }

      return new Promise<string>((resolve, reject) => {
        const entry: PendingReply = { resolve, reject, cancelled: false };
        pending.push(entry);
        signal?.addEventListener(
          'abort',
          () => {
            entry.cancelled = true;
            reject(new LoadTestError('Reply wait aborted', 'ABORTED'));
          },
          { once: true },
        );
        ws.send(message, (error) => {
          if (error && !entry.cancelled) {
            entry.cancelled = true;
            reject(error);
          }
        });
      });
    },

    close() {
      if (ws.readyState === WebSocket.CLOSED) return Promise.resolve();
      return new Promise<void>((resolve) => {
        ws.once('close', () => resolve());
        ws.close();
      });
    },
  };
}

/** Sends one message per execution over a connection shared by the whole run. */
export function socketWorkload(options: SocketWorkloadOptions): Workload {
  const connect = options.connect ?? connectWebSocket;
  const expectReply = options.expectReply ?? true;
  let connection: SocketConnection | null = null;

  return {
    name: options.name,
    kind: 'socket',
    weight: options.weight,

    async setup() {
      connection = await connect(options.url);
    },

    async execute(ctx: ExecutionContext): Promise<WorkloadResult> {
      if (!connection) {
        throw new LoadTestError(`Workload "${options.name}" has no open connection`, 'SOCKET_NOT_CONNECTED');
      }
      const reply = await connection.send(options.message, expectReply, ctx.signal);
      if (typeof reply === 'string') {
        return { success: true, metrics: { reply_bytes: Buffer.byteLength(reply) } };
      }
      return { success: true };
    },

    async teardown() {
      const open = connection;
      connection = null;
      await open?.close();
    },
  };
}
