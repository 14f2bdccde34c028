/**
 * HTTP Signatures for ActivityPub
 *
 * ActivityPub uses HTTP Signatures to verify the authenticity of requests.
 * Outbound requests are signed with rsa-sha256 over
 * `(request-target) host date` plus `digest` when there is a body.
 * See: https://docs.joinmastodon.org/spec/security/
 */

import * as crypto from 'crypto';

/** Maximum distance between a signed Date header and now */
export const MAX_CLOCK_SKEW_MS = 12 * 60 * 60 * 1000;

export interface KeyPair {
    publicKey: string;
    privateKey: string;
}

export interface ParsedSignature {
    keyId: string;
    algorithm?: string;
    headers: string[];
    signature: string;
}

export type SignatureCheck =
    | { valid: true; keyId: string }
    | { valid: false; reason: string; keyId?: string };

/**
 * Generate a new RSA keypair for an actor
 */
export async function generateKeyPair(): Promise<KeyPair> {
    return new Promise((resolve, reject) => {
        crypto.generateKeyPair(
            'rsa',
            {
                modulusLength: 2048,
                publicKeyEncoding: {
                    type: 'spki',
                    format: 'pem',
                },
                privateKeyEncoding: {
                    type: 'pkcs8',
                    format: 'pem',
                },
            },
            (err, publicKey, privateKey) => {
                if (err) {
                    reject(err);
                } else {
                    resolve({ publicKey, privateKey });
                }
            }
        );
    });
}

export function createDigest(body: string): string {
    return `SHA-256=${crypto.createHash('sha256').update(body).digest('base64')}`;
}

/**
 * Sign an HTTP request for ActivityPub
 */
export function signRequest(
    method: string,
    url: string,
    body: string | null,
    privateKeyPem: string,
    keyId: string,
    date: Date = new Date()
): Record<string, string> {
    const urlObj = new URL(url);
    const dateHeader = date.toUTCString();
    const digest = body !== null ? createDigest(body) : null;

    // Build the string to sign
    const signedHeaders = digest ? '(request-target) host date digest' : '(request-target) host date';
    let stringToSign = `(request-target): ${method.toLowerCase()} ${urlObj.pathname}${urlObj.search}`;
    stringToSign += `\nhost: ${urlObj.host}`;
    stringToSign += `\ndate: ${dateHeader}`;
    if (digest) {
        stringToSign += `\ndigest: ${digest}`;
    }

    const privateKey = crypto.createPrivateKey(privateKeyPem);
    const signature = crypto.sign('sha256', Buffer.from(stringToSign), privateKey).toString('base64');

    const signatureHeader = `keyId="${keyId}",algorithm="rsa-sha256",headers="${signedHeaders}",signature="${signature}"`;

    const headers: Record<string, string> = {
        'Date': dateHeader,
        'Signature': signatureHeader,
    };

    if (digest) {
        headers['Digest'] = digest;
    }

    return headers;
}

/**
 * Parse a Signature header into its parameters
 */
export function parseSignatureHeader(header: string): ParsedSignature | null {
    const params: Record<string, string> = {};
    for (const match of header.matchAll(/([a-zA-Z]+)="([^"]*)"/g)) {
        params[match[1]] = match[2];
    }

    if (!params.keyId || !params.signature) {
        return null;
    }

    return {
        keyId: params.keyId,
        algorithm: params.algorithm,
        headers: (params.headers ?? 'date').split(/\s+/).filter(Boolean),
        signature: params.signature,
    };
}

/**
 * Verify an HTTP signature from an incoming request.
 * `headers` must have lower-case names; `path` includes any query string.
 */
export function verifySignature(
    method: string,
    path: string,
    headers: Record<string, string>,
    publicKeyPem: string
): boolean {
    const parsed = headers['signature'] ? parseSignatureHeader(headers['signature']) : null;
    if (!parsed) {
        return false;
    }

    // Reconstruct the string that was signed
    const lines: string[] = [];
    for (const header of parsed.headers) {
        const name = header.toLowerCase();
        if (name === '(request-target)') {
            lines.push(`(request-target): ${method.toLowerCase()} ${path}`);
            continue;
        }
        const value = headers[name];
        if (value === undefined) {
            return false;
        }
        lines.push(`${name}: ${value}`);
    }

    try {
        const publicKey = crypto.createPublicKey(publicKeyPem);
        return crypto.verify(
            'sha256',
            Buffer.from(lines.join('\n')),
            publicKey,
            Buffer.from(parsed.signature, 'base64')
        );
    } catch (error) {
        console.warn('[Signatures] Verification error:', error);
        return false;
    }
}

/**
 * Pre-checks that do not need the sender's key: signature presence,
 * signed header coverage, Date skew and body Digest.
 */
export function checkSignedRequest(
    method: string,
    headers: Record<string, string>,
    body: string,
    now: Date = new Date()
): SignatureCheck {
    const signatureHeader = headers['signature'];
    if (!signatureHeader) {
        return { valid: false, reason: 'missing Signature header' };
    }
    const parsed = parseSignatureHeader(signatureHeader);
    if (!parsed) {
        return { valid: false, reason: 'malformed Signature header' };
    }
    if (parsed.algorithm && !['rsa-sha256', 'hs2019'].includes(parsed.algorithm)) {
        return { valid: false, reason: `unsupported algorithm ${parsed.algorithm}`, keyId: parsed.keyId };
    }

    const signed = new Set(parsed.headers.map((h) => h.toLowerCase()));
    const required = method.toLowerCase() === 'post'
        ? ['(request-target)', 'host', 'date', 'digest']
        : ['(request-target)', 'host', 'date'];
    const missing = required.filter((h) => !signed.has(h));
    if (missing.length > 0) {
        return { valid: false, reason: `unsigned headers: ${missing.join(', ')}`, keyId: parsed.keyId };
    }

    const date = Date.parse(headers['date'] ?? '');
    if (Number.isNaN(date)) {
        return { valid: false, reason: 'missing or invalid Date header', keyId: parsed.keyId };
    }
    if (Math.abs(now.getTime() - date) > MAX_CLOCK_SKEW_MS) {
        return { valid: false, reason: 'Date header outside the accepted window', keyId: parsed.keyId };
    }

    if (signed.has('digest')) {
        const digest = headers['digest']?.replace(/^sha-256=/i, 'SHA-256=');
        if (!digest || digest !== createDigest(body)) {
            return { valid: false, reason: 'Digest does not match body', keyId: parsed.keyId };
        }
    }

    return { valid: true, keyId: parsed.keyId };
}
