/**
 * Inbound request schemas.
 */

import { z } from 'zod';
import { Round, TaskRequest, toAttachment } from '../domain/task';

const AttachmentSchema = z.object({
  name: z.string().min(1),
  /** A data URI or an http(s) locator. */
  url: z.string().min(1),
});

export const TaskRequestSchema = z.object({
  email: z.string().email(),
  // A missing secret is an authentication failure, not a schema error.
  secret: z.string().default(''),
  task: z.string().min(1).max(200),
  round: z.union([z.literal(1), z.literal(2)]),
  nonce: z.string().min(1),
  brief: z.string().min(1),
  checks: z.array(z.string()).default([]),
  evaluation_url: z.string().url(),
  attachments: z.array(AttachmentSchema).default([]),
});

export type TaskRequestBody = z.infer<typeof TaskRequestSchema>;

/** Convert a validated wire body into the pipeline's request model. */
export function toTaskRequest(body: TaskRequestBody): TaskRequest {
  return {
    email: body.email,
    secret: body.secret,
    taskId: body.task,
    round: body.round === 2 ? Round.Revise : Round.Build,
    nonce: body.nonce,
    brief: body.brief,
    checks: body.checks,
    callbackUrl: body.evaluation_url,
    attachments: body.attachments.map((a) => toAttachment(a.name, a.url)),
  };
}
