import type { KeyObject } from 'node:crypto';

/** EOS public keys for the two roles the casino signs with. */
export interface RolePublicKeys {
  /** Co-signs player transactions on `/sign_transaction`. */
  readonly deposit: string;
  /** Authorizes `sgdicesecond` actions answering signidice requests. */
  readonly signidice: string;
}

/**
 * Signing material shared by the event processor and the HTTP API.
 *
 * Built once at startup and frozen; components receive the same instance.
 */
export interface KeyMaterial {
  readonly chainId: string;
  readonly casinoAccount: string;
  readonly publicKeys: RolePublicKeys;
  readonly rsaKey: KeyObject;
}

export function createKeyMaterial(input: KeyMaterial): KeyMaterial {
  return Object.freeze({
    chainId: input.chainId,
    casinoAccount: input.casinoAccount,
    publicKeys: Object.freeze({ ...input.publicKeys }),
    rsaKey: input.rsaKey,
  });
}
