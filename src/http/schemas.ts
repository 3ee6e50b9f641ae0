import { z } from 'zod';

export const analyzeRequestSchema = z.object({
  url: z
    .string({ required_error: 'url is required' })
    .trim()
    .min(1, 'url cannot be empty'),
});
