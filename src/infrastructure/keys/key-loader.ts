import { createPrivateKey } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { createKeyMaterial, KeyMaterialError } from '../../domain/index.js';
import type { KeyMaterial } from '../../domain/index.js';

/**
 * Parses the RSA signing key.
 *
 * The key is configured as base64 of a PEM document (PKCS#1
 * "RSA PRIVATE KEY" or PKCS#8 "PRIVATE KEY"), so it fits in one
 * environment variable.
 */
export function parseRsaKey(base64Pem: string): KeyObject {
  const pem = Buffer.from(base64Pem.trim(), 'base64').toString('utf8');
  if (!pem.includes('-----BEGIN')) {
    throw new KeyMaterialError('RSA key is not base64-encoded PEM');
  }

  let key: KeyObject;
  try {
    key = createPrivateKey(pem);
  } catch (err: unknown) {
    throw new KeyMaterialError('failed to parse RSA private key', { cause: err });
  }
  if (key.asymmetricKeyType !== 'rsa') {
    throw new KeyMaterialError(`expected an RSA key, got ${key.asymmetricKeyType ?? 'unknown'}`);
  }
  return key;
}

/**
 * Reads EOS private keys, one per line. Blank lines and `#` comments are
 * skipped.
 */
export async function readEosKeys(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new KeyMaterialError(`failed to read EOS keys file ${path}`, { cause: err });
  }

  const keys = content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));

  if (keys.length === 0) {
    throw new KeyMaterialError(`no keys found in ${path}`);
  }
  return keys;
}

export function loadKeyMaterial(params: {
  chainId: string;
  casinoAccount: string;
  depositPublicKey: string;
  signidicePublicKey: string;
  rsaKeyBase64: string;
}): KeyMaterial {
  return createKeyMaterial({
    chainId: params.chainId,
    casinoAccount: params.casinoAccount,
    publicKeys: {
      deposit: params.depositPublicKey,
      signidice: params.signidicePublicKey,
    },
    rsaKey: parseRsaKey(params.rsaKeyBase64),
  });
}
