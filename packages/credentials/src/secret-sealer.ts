/**
 * Sealing of stored API keys.
 *
 * Each secret is sealed with AES-256-GCM under the store key, with the
 * principal it belongs to bound in as additional authenticated data, so a
 * sealed value copied under another principal's entry does not open.
 *
 * Sealed form: `sealed:v1:` + base64(nonce(12) || ciphertext || tag(16))
 */

import crypto from 'node:crypto';
import { type Result, ok, err } from 'neverthrow';

const CIPHER = 'aes-256-gcm';
const NONCE_BYTES = 12;
const TAG_BYTES = 16;
const STORE_KEY_BYTES = 32;
const SEALED_PREFIX = 'sealed:v1:';

export type SealError =
	| { type: 'key_missing'; message: string }
	| { type: 'malformed'; message: string }
	| { type: 'rejected'; message: string };

const KEY_MISSING: SealError = {
	type: 'key_missing',
	message: 'No store key. Set ACCESSGRANT_STORE_KEY to a base64-encoded 32-byte key.',
};

export class SecretSealer {
	private readonly key: Buffer | null;

	/**
	 * @param storeKey - Base64 store key; without one, nothing can be sealed or opened
	 * @throws Error if the key does not decode to 32 bytes
	 */
	constructor(storeKey?: string) {
		if (!storeKey) {
			this.key = null;
			return;
		}

		const key = Buffer.from(storeKey, 'base64');
		if (key.length !== STORE_KEY_BYTES) {
			throw new Error(`ACCESSGRANT_STORE_KEY must decode to ${STORE_KEY_BYTES} bytes, got ${key.length}`);
		}
		this.key = key;
	}

	get hasKey(): boolean {
		return this.key !== null;
	}

	seal(principal: string, secret: string): Result<string, SealError> {
		if (!this.key) return err(KEY_MISSING);

		const nonce = crypto.randomBytes(NONCE_BYTES);
		const cipher = crypto.createCipheriv(CIPHER, this.key, nonce);
		cipher.setAAD(Buffer.from(principal, 'utf8'));
		const body = Buffer.concat([cipher.update(secret, 'utf8'), cipher.final()]);

		return ok(SEALED_PREFIX + Buffer.concat([nonce, body, cipher.getAuthTag()]).toString('base64'));
	}

	open(principal: string, sealed: string): Result<string, SealError> {
		if (!this.key) return err(KEY_MISSING);

		if (!sealed.startsWith(SEALED_PREFIX)) {
			return err({ type: 'malformed', message: `Sealed secret lacks the '${SEALED_PREFIX}' prefix` });
		}

		const packed = Buffer.from(sealed.slice(SEALED_PREFIX.length), 'base64');
		if (packed.length < NONCE_BYTES + TAG_BYTES) {
			return err({ type: 'malformed', message: 'Sealed secret is truncated' });
		}

		const decipher = crypto.createDecipheriv(CIPHER, this.key, packed.subarray(0, NONCE_BYTES));
		decipher.setAAD(Buffer.from(principal, 'utf8'));
		decipher.setAuthTag(packed.subarray(-TAG_BYTES));

		try {
			const body = Buffer.concat([decipher.update(packed.subarray(NONCE_BYTES, -TAG_BYTES)), decipher.final()]);
			return ok(body.toString('utf8'));
		} catch (e) {
			return err({
				type: 'rejected',
				message: `Sealed secret failed authentication: ${e instanceof Error ? e.message : String(e)}`,
			});
		}
	}
}

/**
 * A fresh random store key, base64-encoded, for ACCESSGRANT_STORE_KEY.
 */
export function generateStoreKey(): string {
	return crypto.randomBytes(STORE_KEY_BYTES).toString('base64');
}
