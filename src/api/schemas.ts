import { z } from 'zod';
import { ValidationError } from '../errors/broker.js';

// ── Request schemas ──────────────────────────────────────────────────────────

const payload = z.record(z.unknown());
const identifier = z.string().trim().min(1);

export const submitBodySchema = z.object({
  kind: identifier,
  model: identifier,
  payload,
});

export const submitAndWaitBodySchema = submitBodySchema.extend({
  timeoutMs: z.number().int().positive().optional(),
});

export const capabilitiesBodySchema = z.object({
  providerId: identifier,
  models: z.array(z.string()),
  kinds: z.array(z.string()),
});

export const resultBodySchema = z.union([
  z.object({
    requestId: identifier,
    error: z.string().min(1),
  }),
  z.object({
    requestId: identifier,
    result: payload,
    usage: payload.optional(),
  }),
]);

export const completionBodySchema = z
  .object({
    model: identifier,
    prompt: z.union([z.string(), z.array(z.string())]),
  })
  .passthrough();

export const chatCompletionBodySchema = z
  .object({
    model: identifier,
    messages: z.array(z.object({ role: z.string(), content: z.unknown() }).passthrough()).min(1),
  })
  .passthrough();

export const statusParamsSchema = z.object({ id: identifier });

export type SubmitBody = z.infer<typeof submitBodySchema>;
export type SubmitAndWaitBody = z.infer<typeof submitAndWaitBodySchema>;
export type CapabilitiesBody = z.infer<typeof capabilitiesBodySchema>;
export type ResultBody = z.infer<typeof resultBodySchema>;

// ── Response schemas ─────────────────────────────────────────────────────────

export interface SubmitResponse {
  requestId: string;
}

export interface ErrorResponse {
  error: { code: string; message: string };
}

export interface ModelObject {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
  providers: string[];
}

export interface ModelsResponse {
  object: 'list';
  data: ModelObject[];
}

export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(issues, parsed.error);
  }
  return parsed.data;
}
