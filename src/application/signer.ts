import { constants, privateEncrypt } from 'node:crypto';
import type { KeyObject } from 'node:crypto';

/** DER prefix of a PKCS#1 DigestInfo for SHA-256. */
const SHA256_DIGEST_INFO = Buffer.from('3031300d060960864801650304020105000420', 'hex');

const DIGEST_BYTES = 32;

/**
 * Signs a precomputed SHA-256 digest with RSASSA-PKCS1-v1_5.
 *
 * The digest is not hashed again: it is wrapped in a DigestInfo and
 * block-type-1 padded, so the result verifies as a regular
 * `RSA-SHA256` signature over whatever message produced the digest.
 *
 * The game contracts expect the signature as base64 text.
 */
export function rsaSign(digest: Uint8Array, key: KeyObject): string {
  if (digest.length !== DIGEST_BYTES) {
    throw new RangeError(`digest must be ${DIGEST_BYTES} bytes, got ${digest.length}`);
  }

  const signature = privateEncrypt(
    { key, padding: constants.RSA_PKCS1_PADDING },
    Buffer.concat([SHA256_DIGEST_INFO, digest]),
  );

  return signature.toString('base64');
}
