import { z } from 'zod';

export const chatMessageInSchema = z.object({
  type: z.literal('chat'),
  message: z.string().refine((text) => text.trim().length > 0, 'message must not be empty'),
});

export const giftEventInSchema = z.object({
  from: z.string().min(1),
  gift_id: z.number().int().min(0),
  amount: z.number().int().min(1),
});

export const thresholdUpdateSchema = z.object({
  threshold: z.number(),
});

export const adminTargetSchema = z.object({
  username: z.string().min(1, 'Username required'),
});

export const registerSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  email: z.string().email().optional(),
});

export const loginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

/**
 * Flatten a zod error into a single human-readable line
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
