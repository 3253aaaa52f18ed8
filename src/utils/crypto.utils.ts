import crypto from 'crypto';
import { KeyPair } from '@/types/device.types';

const HEX_KEY = /^[0-9a-fA-F]{64}$/;

const hexToBase64Url = (hex: string): string => Buffer.from(hex, 'hex').toString('base64url');

const base64UrlToHex = (value: string): string => Buffer.from(value, 'base64url').toString('hex');

export const isHexKey = (value: string): boolean => HEX_KEY.test(value);

/**
 * Account identifier the platform derives from a public key
 */
export const accountFromPublicKey = (publicKey: string): string => `k:${publicKey}`;

/**
 * Generate a fresh Ed25519 key pair as hex strings
 */
export function generateKeyPair(): KeyPair {
  const { privateKey } = crypto.generateKeyPairSync('ed25519');
  const jwk = privateKey.export({ format: 'jwk' });
  if (!jwk.d || !jwk.x) {
    throw new Error('Ed25519 key export did not include key material');
  }
  return { publicKey: base64UrlToHex(jwk.x), secretKey: base64UrlToHex(jwk.d) };
}

function toPrivateKey(keyPair: KeyPair): crypto.KeyObject {
  return crypto.createPrivateKey({
    key: {
      kty: 'OKP',
      crv: 'Ed25519',
      d: hexToBase64Url(keyPair.secretKey),
      x: hexToBase64Url(keyPair.publicKey),
    },
    format: 'jwk',
  });
}

function toPublicKey(publicKey: string): crypto.KeyObject {
  return crypto.createPublicKey({
    key: { kty: 'OKP', crv: 'Ed25519', x: hexToBase64Url(publicKey) },
    format: 'jwk',
  });
}

/**
 * Sign a UTF-8 message with an Ed25519 key pair
 * @returns hex signature
 */
export function signMessage(message: string, keyPair: KeyPair): string {
  return crypto.sign(null, Buffer.from(message, 'utf8'), toPrivateKey(keyPair)).toString('hex');
}

/**
 * Verify a hex Ed25519 signature. Malformed keys or signatures verify as false.
 */
export function verifySignature(message: string, signature: string, publicKey: string): boolean {
  if (!isHexKey(publicKey) || !/^[0-9a-fA-F]{128}$/.test(signature)) {
    return false;
  }
  try {
    return crypto.verify(
      null,
      Buffer.from(message, 'utf8'),
      toPublicKey(publicKey),
      Buffer.from(signature, 'hex')
    );
  } catch {
    return false;
  }
}

/**
 * SHA-256 of a string, base64url encoded
 */
export const hashMessage = (message: string): string =>
  crypto.createHash('sha256').update(message).digest('base64url');

/**
 * Check that a key pair's public half matches its secret seed
 */
export function isMatchingKeyPair(keyPair: KeyPair): boolean {
  if (!isHexKey(keyPair.publicKey) || !isHexKey(keyPair.secretKey)) {
    return false;
  }
  try {
    const derived = crypto.createPublicKey(toPrivateKey(keyPair)).export({ format: 'jwk' });
    return derived.x !== undefined && base64UrlToHex(derived.x) === keyPair.publicKey.toLowerCase();
  } catch {
    return false;
  }
}
