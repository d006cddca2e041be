import { z } from 'zod';
import { Role } from '../../access-scope/types';

export const submitTurnSchema = z.object({
    conversationId: z.string().min(1).optional(),
    userId: z.string().min(1, 'userId is required'),
    role: z.nativeEnum(Role, { errorMap: () => ({ message: `role must be one of: ${Object.values(Role).join(', ')}` }) }),
    message: z.string({ required_error: 'message is required' }),
    includeSources: z.boolean().default(true),
});

export interface SubmitTurnDto {
    conversationId?: string;
    userId: string;
    /** Validated against the closed role set. */
    role: string;
    message: string;
    includeSources?: boolean;
}

export type ValidTurnRequest = z.infer<typeof submitTurnSchema>;
