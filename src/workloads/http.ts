import type { ExecutionContext, Workload, WorkloadResult } from '../types.js';

export interface HttpWorkloadOptions {
  name: string;
  url: string;
  method?: string;
  headers?: Record<string, string>;
  /** Sent as-is when a string, JSON-encoded otherwise. */
  body?: unknown;
  /** Statuses counted as success; any 2xx when omitted. */
  expectStatus?: number[];
  weight?: number;
}

function encodeBody(body: unknown, headers: Record<string, string>): string | undefined {
  if (body === undefined) return undefined;
  if (typeof body === 'string') return body;

  const hasContentType = Object.keys(headers).some((key) => key.toLowerCase() === 'content-type');
  if (!hasContentType) {
    headers['Content-Type'] = 'application/json';
  }
  return JSON.stringify(body);
}

/** One HTTP request per execution using the global fetch. */
export function httpWorkload(options: HttpWorkloadOptions): Workload {
  const method = (options.method ?? 'GET').toUpperCase();
  const headers: Record<string, string> = { ...options.headers };
  const body = encodeBody(options.body, headers);

  return {
    name: options.name,
    kind: 'http',
    weight: options.weight,
    async execute(ctx: ExecutionContext): Promise<WorkloadResult> {
      const response = await fetch(options.url, {
        method,
        headers,
        body,
        signal: ctx.signal,
      });
      const payload = await response.arrayBuffer();

      const success = options.expectStatus ? options.expectStatus.includes(response.status) : response.ok;
      return {
        success,
        statusCode: response.status,
        error: success ? undefined : `${method} ${options.url} returned ${response.status}`,
        errorCode: success ? undefined : `HTTP_${response.status}`,
        metrics: { response_bytes: payload.byteLength },
      };
    },
  };
}
