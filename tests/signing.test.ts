import { createHmac } from 'crypto';
import { sign } from '../src/exchange/signing';

describe('sign', () => {
    const secret = 'test-secret';

    test('is lowercase hex HMAC-SHA512 of timestamp + METHOD + path + body', () => {
        const body = '{"pair":"BTCZAR"}';
        const expected = createHmac('sha512', secret)
            .update(`1705320000000POST/v1/orders/limit${body}`)
            .digest('hex');

        const signature = sign(secret, 1705320000000, 'POST', '/v1/orders/limit', body);

        expect(signature).toBe(expected);
        expect(signature).toMatch(/^[0-9a-f]{128}$/);
    });

    test('upper-cases the method', () => {
        expect(sign(secret, 1, 'get', '/v1/account/balances')).toBe(sign(secret, 1, 'GET', '/v1/account/balances'));
    });

    test('covers the query string, the body and the timestamp', () => {
        const base = sign(secret, 1, 'GET', '/v1/orders/open');
        expect(sign(secret, 1, 'GET', '/v1/orders/open?pair=BTCZAR')).not.toBe(base);
        expect(sign(secret, 1, 'GET', '/v1/orders/open', '{}')).not.toBe(base);
        expect(sign(secret, 2, 'GET', '/v1/orders/open')).not.toBe(base);
    });
});
