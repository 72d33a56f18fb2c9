/**
 * File-backed credential store.
 *
 * `credentials.json` maps each principal to its API key, sealed for that
 * principal. Plaintext secrets never touch the disk.
 */

import { join } from 'node:path';
import { err, ok } from 'neverthrow';
import { z } from 'zod';
import { ClientError, type ClientResult } from '@accessgrant/domain-core';
import { readJsonFile, writeJsonFile } from './json-file.js';
import type { SecretSealer } from './secret-sealer.js';

export const CREDENTIALS_FILE = 'credentials.json';

const STORE_UNREADABLE = 'CREDENTIAL_STORE_UNREADABLE';
const STORE_UNWRITABLE = 'CREDENTIAL_STORE_UNWRITABLE';

const CredentialFileSchema = z.object({
	version: z.literal(1),
	principals: z.record(z.string(), z.string()),
});

type CredentialFile = z.infer<typeof CredentialFileSchema>;

const EMPTY_FILE: CredentialFile = { version: 1, principals: {} };

export interface CredentialStoreOptions {
	/** Directory holding credentials.json */
	readonly dir: string;
	readonly sealer: SecretSealer;
}

export class CredentialStore {
	private readonly path: string;
	private readonly sealer: SecretSealer;

	constructor(options: CredentialStoreOptions) {
		this.path = join(options.dir, CREDENTIALS_FILE);
		this.sealer = options.sealer;
	}

	/**
	 * Seal and persist a secret, replacing any previous one for the principal.
	 */
	async save(principal: string, secret: string): Promise<ClientResult<void>> {
		const sealed = this.sealer.seal(principal, secret);
		if (sealed.isErr()) {
			return err(ClientError.authResolution(sealed.error.message, 'STORE_KEY_UNAVAILABLE'));
		}

		const file = await this.read();
		if (file.isErr()) return err(file.error);

		return writeJsonFile(
			this.path,
			{ ...file.value, principals: { ...file.value.principals, [principal]: sealed.value } },
			STORE_UNWRITABLE,
		);
	}

	/**
	 * The principal's secret, or null when none is stored.
	 */
	async load(principal: string): Promise<ClientResult<string | null>> {
		const file = await this.read();
		if (file.isErr()) return err(file.error);

		const sealed = file.value.principals[principal];
		if (sealed === undefined) {
			return ok(null);
		}

		const secret = this.sealer.open(principal, sealed);
		if (secret.isErr()) {
			return err(
				ClientError.authResolution(
					`Stored secret for ${principal} cannot be opened: ${secret.error.message}`,
					secret.error.type === 'key_missing' ? 'STORE_KEY_UNAVAILABLE' : 'CREDENTIAL_UNREADABLE',
				),
			);
		}
		return ok(secret.value);
	}

	/**
	 * Forget a principal. Returns whether anything was removed.
	 */
	async remove(principal: string): Promise<ClientResult<boolean>> {
		const file = await this.read();
		if (file.isErr()) return err(file.error);

		if (!(principal in file.value.principals)) {
			return ok(false);
		}

		const principals = Object.fromEntries(
			Object.entries(file.value.principals).filter(([name]) => name !== principal),
		);
		const written = await writeJsonFile(this.path, { ...file.value, principals }, STORE_UNWRITABLE);
		if (written.isErr()) return err(written.error);

		return ok(true);
	}

	/**
	 * Stored principals, sorted.
	 */
	async principals(): Promise<ClientResult<string[]>> {
		const file = await this.read();
		if (file.isErr()) return err(file.error);

		return ok(Object.keys(file.value.principals).sort());
	}

	private async read(): Promise<ClientResult<CredentialFile>> {
		const file = await readJsonFile(this.path, CredentialFileSchema, STORE_UNREADABLE);
		if (file.isErr()) return err(file.error);

		return ok(file.value ?? EMPTY_FILE);
	}
}
