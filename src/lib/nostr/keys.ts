/**
 * Nostr Keys
 *
 * secp256k1 x-only keys in lowercase hex.
 */

import { schnorr, secp256k1 } from '@noble/curves/secp256k1';
import { sha256 } from '@noble/hashes/sha256';
import { hmac } from '@noble/hashes/hmac';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

export function getPublicKey(secretKey: string): string {
    return bytesToHex(schnorr.getPublicKey(secretKey));
}

/**
 * Derive a stable secret key for `subject` from the bridge secret.
 * The same inputs always produce the same key.
 */
export function deriveSecretKey(secret: string, subject: string): string {
    for (let counter = 0; ; counter++) {
        const candidate = hmac(sha256, utf8ToBytes(secret), utf8ToBytes(`nostr-key:${counter}:${subject}`));
        if (secp256k1.utils.isValidPrivateKey(candidate)) {
            return bytesToHex(candidate);
        }
    }
}

export function isHexKey(value: string): boolean {
    return /^[0-9a-f]{64}$/.test(value);
}
