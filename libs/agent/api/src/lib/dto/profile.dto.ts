import { z } from 'zod';

/**
 * Profile context is collaborator-defined; only the top-level shape is checked
 */
export const profileRequestSchema = z.record(z.unknown());

export type ProfileRequestDto = z.infer<typeof profileRequestSchema>;
