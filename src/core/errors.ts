/**
 * Structured overlay error taxonomy.
 * @module core/errors
 */

export type OverlayErrorDomain = 'config' | 'wire' | 'transport';

export type OverlayErrorCode =
    | 'CONFIG_UNREADABLE'
    | 'CONFIG_INVALID'
    | 'PAYLOAD_TOO_LARGE'
    | 'SEND_FAILED'
    | 'BIND_FAILED'
    | 'RECEIVE_FAILED';

export class OverlayError extends Error {
    public readonly domain: OverlayErrorDomain;
    public readonly code: OverlayErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(params: {
        message: string;
        domain: OverlayErrorDomain;
        code: OverlayErrorCode;
        details?: Record<string, unknown>;
        cause?: unknown;
    }) {
        super(params.message, params.cause === undefined ? undefined : {cause: params.cause});
        this.name = 'OverlayError';
        this.domain = params.domain;
        this.code = params.code;
        this.details = params.details;
    }
}

const TRANSPORT_ERROR_MESSAGES: Record<'SEND_FAILED' | 'BIND_FAILED' | 'RECEIVE_FAILED', string> = {
    SEND_FAILED: 'Failed to send overlay datagram',
    BIND_FAILED: 'Failed to bind overlay socket',
    RECEIVE_FAILED: 'Overlay socket receive error',
};

/** Wrap a socket error into an `OverlayError` of the transport domain. */
export const toTransportError = (
    code: 'SEND_FAILED' | 'BIND_FAILED' | 'RECEIVE_FAILED',
    err: unknown,
    details?: Record<string, unknown>,
): OverlayError => {
    const reason = err instanceof Error ? err.message : String(err);
    return new OverlayError({
        message: `${TRANSPORT_ERROR_MESSAGES[code]}: ${reason}`,
        domain: 'transport',
        code,
        details,
        cause: err,
    });
};
