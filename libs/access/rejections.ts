/**
 * Admission and issuance rejection taxonomy.
 *
 * Rejections are returned as values. The transport maps each reason to an
 * HTTP status and tells the client whether a retry can succeed.
 */
export type RejectionReason =
    | 'MALFORMED_CREDENTIAL_PRESENTATION'
    | 'UNRECOGNIZED_CREDENTIAL'
    | 'STORE_UNAVAILABLE'
    | 'NOT_AUTHORIZED'
    | 'INVALID_REQUESTED_TIER'
    | 'INVALID_LABEL'
    | 'ISSUANCE_FAILED';

export interface RejectionDescriptor {
    readonly statusCode: number;
    readonly retryable: boolean;
    readonly message: string;
}

export const REJECTIONS: Readonly<Record<RejectionReason, RejectionDescriptor>> = {
    MALFORMED_CREDENTIAL_PRESENTATION: {
        statusCode: 400,
        retryable: false,
        message: 'At most one credential may be presented per request'
    },
    UNRECOGNIZED_CREDENTIAL: {
        statusCode: 401,
        retryable: false,
        message: 'Credential not recognized'
    },
    STORE_UNAVAILABLE: {
        statusCode: 503,
        retryable: true,
        message: 'Credential store temporarily unavailable'
    },
    NOT_AUTHORIZED: {
        statusCode: 403,
        retryable: false,
        message: 'Insufficient access level for this operation'
    },
    INVALID_REQUESTED_TIER: {
        statusCode: 400,
        retryable: false,
        message: 'Requested access level cannot be issued'
    },
    INVALID_LABEL: {
        statusCode: 400,
        retryable: false,
        message: 'Credential label must be 1-128 characters'
    },
    ISSUANCE_FAILED: {
        statusCode: 503,
        retryable: true,
        message: 'Credential could not be stored'
    }
};

export function describeRejection(reason: RejectionReason): RejectionDescriptor {
    return REJECTIONS[reason];
}
