import crypto from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { buildSignatureMessage, kalshiAuthHeaders, loadPrivateKey, signMessage } from '../venues/kalshiAuth.js';

const { privateKey, publicKey } = crypto.generateKeyPairSync('rsa', { modulusLength: 2048 });

const verify = (message: string, signature: string): boolean =>
  crypto.verify(
    'sha256',
    Buffer.from(message, 'utf8'),
    {
      key: publicKey,
      padding: crypto.constants.RSA_PKCS1_PSS_PADDING,
      saltLength: crypto.constants.RSA_PSS_SALTLEN_DIGEST
    },
    Buffer.from(signature, 'base64')
  );

describe('kalshi auth', () => {
  it('should build the message from timestamp, upper-cased method and path without query', () => {
    expect(buildSignatureMessage('1700000000000', 'get', '/trade-api/v2/markets?limit=5')).toBe(
      '1700000000000GET/trade-api/v2/markets'
    );
  });

  it('should produce an RSA-PSS signature the public key verifies', () => {
    const message = buildSignatureMessage('1700000000000', 'POST', '/trade-api/v2/portfolio/orders');

    const signature = signMessage(message, privateKey);

    expect(verify(message, signature)).toBe(true);
    expect(verify(`${message}x`, signature)).toBe(false);
  });

  it('should load PEM keys with escaped line breaks', () => {
    const pem = privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();
    const escaped = pem.replace(/\n/g, '\\n');

    const key = loadPrivateKey(escaped);

    expect(key.asymmetricKeyType).toBe('rsa');
  });

  it('should emit the three access headers', () => {
    const headers = kalshiAuthHeaders('test-key-id', privateKey, 'DELETE', '/trade-api/v2/portfolio/orders/abc', '1700000000000');

    expect(headers['KALSHI-ACCESS-KEY']).toBe('test-key-id');
    expect(headers['KALSHI-ACCESS-TIMESTAMP']).toBe('1700000000000');
    expect(
      verify('1700000000000DELETE/trade-api/v2/portfolio/orders/abc', headers['KALSHI-ACCESS-SIGNATURE'])
    ).toBe(true);
  });
});
