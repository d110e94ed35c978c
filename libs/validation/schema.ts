import { z } from 'zod';

/**
 * POST /request_interpretation body.
 * `input` is text; it reaches the engine as its UTF-8 bytes.
 */
export const InterpretationRequestSchema = z.object({
    instructions: z.string(),
    input: z.string().default('')
});

export type InterpretationRequest = z.infer<typeof InterpretationRequestSchema>;

/**
 * POST /keys body. `access_level` is the numeric tier code; label length is
 * checked by CredentialIssuanceService once the caller is authorized.
 */
export const KeyIssuanceRequestSchema = z.object({
    access_level: z.number().int(),
    label: z.string()
});

export type KeyIssuanceRequest = z.infer<typeof KeyIssuanceRequestSchema>;
