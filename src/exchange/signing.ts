import { createHmac } from 'crypto';

/**
 * Request signature: lowercase hex HMAC-SHA512 of
 * `timestamp + METHOD + path + body`.
 *
 * `path` includes the version prefix and query string, e.g.
 * `/v1/orders/open?pair=BTCZAR`. `body` is the exact serialized payload, or
 * the empty string for requests without one.
 */
export function sign(
    secret: string,
    timestamp: number | string,
    method: string,
    path: string,
    body: string = ''
): string {
    return createHmac('sha512', secret)
        .update(`${timestamp}${method.toUpperCase()}${path}${body}`)
        .digest('hex');
}
