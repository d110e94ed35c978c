import type { IncomingMessage } from 'node:http';

export const CREDENTIAL_HEADER = 'x-api-key';

/**
 * Every value presented for the credential header, duplicates included.
 * Node joins repeated unknown headers in `headers`; `headersDistinct` keeps them apart.
 */
export function presentedCredentials(req: Pick<IncomingMessage, 'headersDistinct'>): readonly string[] {
    return req.headersDistinct[CREDENTIAL_HEADER] ?? [];
}
