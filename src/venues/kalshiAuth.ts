/**
 * Kalshi request signing.
 *
 * Signature: RSA-PSS(SHA256, timestamp_ms + METHOD + path), base64 encoded,
 * where path includes the API prefix (e.g. /trade-api/v2) and drops any query
 * string. Sent as KALSHI-ACCESS-KEY / -TIMESTAMP / -SIGNATURE headers.
 */

import crypto from 'node:crypto';

export function buildSignatureMessage(timestampMs: string, method: string, path: string): string {
  const pathWithoutQuery = path.split('?')[0];
  return `${timestampMs}${method.toUpperCase()}${pathWithoutQuery}`;
}

/** Accepts PEM text with real or escaped (`\n`) line breaks. */
export function loadPrivateKey(pem: string): crypto.KeyObject {
  return crypto.createPrivateKey(pem.replace(/\\n/g, '\n'));
}

export function signMessage(message: string, key: crypto.KeyObject): string {
  return crypto
    .sign('sha256', Buffer.from(message, 'utf8'), {
      key,
      padding: crypto.constants.RSA_PKCS1_PSS_PADDING,
      saltLength: crypto.constants.RSA_PSS_SALTLEN_DIGEST
    })
    .toString('base64');
}

export function kalshiAuthHeaders(
  apiKeyId: string,
  key: crypto.KeyObject,
  method: string,
  path: string,
  timestampMs: string = Date.now().toString()
): Record<string, string> {
  return {
    'KALSHI-ACCESS-KEY': apiKeyId,
    'KALSHI-ACCESS-TIMESTAMP': timestampMs,
    'KALSHI-ACCESS-SIGNATURE': signMessage(buildSignatureMessage(timestampMs, method, path), key)
  };
}
