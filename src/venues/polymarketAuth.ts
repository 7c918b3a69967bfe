import crypto from 'node:crypto';
import { Wallet } from 'ethers';
import { z } from 'zod';
import { getErrorMessage, VenueNotReadyError, VenueRequestError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

const log = logger.child('polymarket-auth');

export const CLOB_AUTH_DOMAIN = { name: 'ClobAuthDomain', version: '1' } as const;

export const CLOB_AUTH_TYPES = {
  ClobAuth: [
    { name: 'address', type: 'address' },
    { name: 'timestamp', type: 'string' },
    { name: 'nonce', type: 'uint256' },
    { name: 'message', type: 'string' }
  ]
};

export const CLOB_AUTH_MESSAGE = 'This message attests that I control the given wallet';

export interface ApiCredentials {
  key: string;
  secret: string;
  passphrase: string;
}

const credentialsSchema = z.object({
  apiKey: z.string().min(1),
  secret: z.string().min(1),
  passphrase: z.string().min(1)
});

const unixSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * HMAC-SHA256 over timestamp + METHOD + path (+ body), keyed with the
 * base64-decoded secret and returned as URL-safe base64.
 */
export function buildHmacSignature(
  secret: string,
  timestamp: number,
  method: string,
  path: string,
  body?: string
): string {
  const message = `${timestamp}${method.toUpperCase()}${path}${body ?? ''}`;
  return crypto
    .createHmac('sha256', Buffer.from(secret, 'base64'))
    .update(message, 'utf8')
    .digest('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');
}

/**
 * Wallet-based CLOB authentication. API credentials are obtained by signing an
 * EIP-712 attestation with the wallet key (L1); each trading request is then
 * signed with the derived secret (L2).
 */
export class PolymarketClobAuth {
  private readonly wallet: Wallet;
  private credentials?: ApiCredentials;

  constructor(
    privateKey: string,
    private readonly chainId: number,
    private readonly baseUrl: string,
    private readonly timeoutMs: number
  ) {
    const trimmed = privateKey.trim();
    if (!trimmed) {
      throw new VenueNotReadyError('Polymarket private key is required for CLOB authentication', 'polymarket');
    }
    this.wallet = new Wallet(trimmed.startsWith('0x') ? trimmed : `0x${trimmed}`);
  }

  get address(): string {
    return this.wallet.address;
  }

  async l1Headers(nonce = 0, timestamp: number = unixSeconds()): Promise<Record<string, string>> {
    const signature = await this.wallet.signTypedData(
      { ...CLOB_AUTH_DOMAIN, chainId: this.chainId },
      CLOB_AUTH_TYPES,
      {
        address: this.wallet.address,
        timestamp: String(timestamp),
        nonce,
        message: CLOB_AUTH_MESSAGE
      }
    );

    return {
      POLY_ADDRESS: this.wallet.address,
      POLY_SIGNATURE: signature,
      POLY_TIMESTAMP: String(timestamp),
      POLY_NONCE: String(nonce)
    };
  }

  async l2Headers(
    method: string,
    path: string,
    body?: string,
    timestamp: number = unixSeconds()
  ): Promise<Record<string, string>> {
    const creds = await this.ensureCredentials();
    return {
      POLY_ADDRESS: this.wallet.address,
      POLY_SIGNATURE: buildHmacSignature(creds.secret, timestamp, method, path, body),
      POLY_TIMESTAMP: String(timestamp),
      POLY_API_KEY: creds.key,
      POLY_PASSPHRASE: creds.passphrase
    };
  }

  /** EOA-signed (signature type 0) good-till-cancelled buy order. */
  async signBuyOrder(order: UnsignedOrder): Promise<SignedOrder> {
    const amounts = buyOrderAmounts(order.price, order.size);
    const message = {
      salt: order.salt,
      maker: this.wallet.address,
      signer: this.wallet.address,
      taker: ZERO_ADDRESS,
      tokenId: order.tokenId,
      makerAmount: amounts.makerAmount,
      takerAmount: amounts.takerAmount,
      expiration: '0',
      nonce: '0',
      feeRateBps: '0',
      side: 0,
      signatureType: 0
    };

    const signature = await this.wallet.signTypedData(
      { ...CTF_EXCHANGE_DOMAIN, chainId: this.chainId },
      CTF_ORDER_TYPES,
      message
    );

    return { ...message, side: 'BUY', signature };
  }

  /** Creates an API key, falling back to deriving the existing one. */
  async ensureCredentials(): Promise<ApiCredentials> {
    if (this.credentials) {
      return this.credentials;
    }

    try {
      this.credentials = await this.requestCredentials('POST', '/auth/api-key');
    } catch (error) {
      log.warn('Polymarket API key creation failed, deriving instead', {
        error: getErrorMessage(error)
      });
      this.credentials = await this.requestCredentials('GET', '/auth/derive-api-key');
    }

    log.info('Polymarket CLOB credentials ready', { address: this.wallet.address });
    return this.credentials;
  }

  private async requestCredentials(method: 'GET' | 'POST', path: string): Promise<ApiCredentials> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: await this.l1Headers(),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      throw new VenueRequestError(
        `Polymarket ${method} ${path} failed: ${await response.text()}`,
        'polymarket',
        response.status
      );
    }

    const parsed = credentialsSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new VenueRequestError(`Polymarket ${path} returned no credentials`, 'polymarket', response.status);
    }

    return {
      key: parsed.data.apiKey,
      secret: parsed.data.secret,
      passphrase: parsed.data.passphrase
    };
  }
}

export const CTF_EXCHANGE_DOMAIN = {
  name: 'Polymarket CTF Exchange',
  version: '1',
  verifyingContract: '0x4bFb41d5B3570DeFd03C39a9A4D8dE6Bd8B8982E'
} as const;

export const CTF_ORDER_TYPES = {
  Order: [
    { name: 'salt', type: 'uint256' },
    { name: 'maker', type: 'address' },
    { name: 'signer', type: 'address' },
    { name: 'taker', type: 'address' },
    { name: 'tokenId', type: 'uint256' },
    { name: 'makerAmount', type: 'uint256' },
    { name: 'takerAmount', type: 'uint256' },
    { name: 'expiration', type: 'uint256' },
    { name: 'nonce', type: 'uint256' },
    { name: 'feeRateBps', type: 'uint256' },
    { name: 'side', type: 'uint8' },
    { name: 'signatureType', type: 'uint8' }
  ]
};

const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';
const USDC_DECIMALS = 1_000_000;

export interface UnsignedOrder {
  tokenId: string;
  /** Price per share, strictly between 0 and 1. */
  price: number;
  size: number;
  salt: number;
}

export interface SignedOrder {
  salt: number;
  maker: string;
  signer: string;
  taker: string;
  tokenId: string;
  makerAmount: string;
  takerAmount: string;
  expiration: string;
  nonce: string;
  feeRateBps: string;
  side: 'BUY';
  signatureType: number;
  signature: string;
}

// CLOB rounding for a 0.01 tick: sizes to 2 decimals, notional to 4.
const SIZE_UNITS = 100;
const NOTIONAL_UNITS = 10_000;
const FLOAT_EPSILON = 1e-9;

/**
 * Buy amounts in USDC base units: pay price × size, receive size shares. The
 * size is floored to the venue's share precision first.
 */
export function buyOrderAmounts(price: number, size: number): { makerAmount: string; takerAmount: string } {
  const sizeUnits = Math.floor(size * SIZE_UNITS + FLOAT_EPSILON);
  const notionalUnits = Math.round(price * sizeUnits * (NOTIONAL_UNITS / SIZE_UNITS));
  return {
    makerAmount: String(notionalUnits * (USDC_DECIMALS / NOTIONAL_UNITS)),
    takerAmount: String(sizeUnits * (USDC_DECIMALS / SIZE_UNITS))
  };
}
