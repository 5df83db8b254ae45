import { z } from 'zod';
import type { Payload, QueuedRequest, RequestStats, WaitResult } from '../types/broker.types.js';
import type { ResultSubmission } from '../broker/broker.js';
import { BrokerClientError } from '../errors/backend.js';

const payloadSchema = z.record(z.unknown());

const queuedRequestSchema = z.object({
  id: z.string(),
  kind: z.string(),
  model: z.string(),
  payload: payloadSchema,
  status: z.enum(['pending', 'processing', 'completed', 'failed']),
  createdAt: z.number(),
  startedAt: z.number().optional(),
  completedAt: z.number().optional(),
  error: z.string().optional(),
  providerId: z.string().optional(),
});

const waitResultSchema = z.object({
  requestId: z.string(),
  result: payloadSchema,
  usage: payloadSchema.optional(),
});

const statsSchema = z.object({
  pending: z.number(),
  processing: z.number(),
  completed: z.number(),
  failed: z.number(),
  total: z.number(),
});

export interface PollQuery {
  providerId: string;
  models: readonly string[];
  kinds: readonly string[];
}

/** The part of the broker a provider worker talks to. */
export type BrokerConnection = Pick<BrokerClient, 'poll' | 'submitResult'>;

/** Thin fetch wrapper over the broker's HTTP surface, used by providers and the CLI. */
export class BrokerClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async poll(query: PollQuery): Promise<QueuedRequest | null> {
    const res = await this.send('POST', '/queue/next', query);
    if (res.status === 204) return null;
    return this.parse(res, queuedRequestSchema);
  }

  async submitResult(submission: ResultSubmission): Promise<void> {
    await this.send('POST', '/queue/result', submission);
  }

  async register(query: PollQuery): Promise<void> {
    await this.send('POST', '/providers/register', query);
  }

  async submitAndWait(
    kind: string,
    model: string,
    payload: Payload,
    timeoutMs?: number,
  ): Promise<WaitResult> {
    const res = await this.send('POST', '/queue/submit-and-wait', {
      kind,
      model,
      payload,
      ...(timeoutMs !== undefined && { timeoutMs }),
    });
    return this.parse(res, waitResultSchema);
  }

  async stats(): Promise<RequestStats & { providers: number }> {
    const res = await this.send('GET', '/queue/stats');
    return this.parse(res, statsSchema.extend({ providers: z.number() }));
  }

  private async send(method: 'GET' | 'POST', path: string, body?: unknown): Promise<Response> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        method,
        ...(body !== undefined && {
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(body),
        }),
      });
    } catch (err) {
      throw new BrokerClientError(`Broker unreachable at ${this.baseUrl}`, undefined, err);
    }

    if (!res.ok) {
      const detail = await res.text();
      throw new BrokerClientError(
        `Broker ${method} ${path} failed: ${res.status} ${detail || res.statusText}`,
        res.status,
      );
    }
    return res;
  }

  private async parse<T>(res: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new BrokerClientError(`Unexpected broker response: ${parsed.error.message}`, res.status);
    }
    return parsed.data;
  }
}
