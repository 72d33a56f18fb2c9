/**
 * Credential providers
 *
 * The executor asks its provider for a credential on every request; nothing
 * above the executor ever sees the secret.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { err, ok } from 'neverthrow';
import { loadClientEnv, normalizeHost } from '@accessgrant/config';
import { ClientError, type ClientResult } from '@accessgrant/domain-core';
import { CredentialStore } from './credential-store.js';
import { SecretSealer } from './secret-sealer.js';
import { HostRecord } from './host-record.js';

/**
 * The (principal, secret, host) triple every request is authenticated with.
 */
export interface Credential {
	/** Account the API key belongs to, sent as `Email` */
	readonly principal: string;
	readonly secret: string;
	/** Service base URL, without trailing slash */
	readonly host: string;
}

export interface CredentialProvider {
	resolve(): Promise<ClientResult<Credential>>;
}

/**
 * A credential with the secret replaced, safe to log.
 */
export function redactCredential(credential: Credential): { principal: string; host: string; secret: string } {
	return { principal: credential.principal, host: credential.host, secret: '[REDACTED]' };
}

/**
 * Serves a credential supplied directly by the caller.
 */
export class StaticCredentialProvider implements CredentialProvider {
	private readonly credential: Credential;

	constructor(credential: Credential) {
		this.credential = { ...credential, host: normalizeHost(credential.host) };
	}

	async resolve(): Promise<ClientResult<Credential>> {
		const { principal, secret, host } = this.credential;
		if (principal.trim() === '' || secret === '' || host === '') {
			return err(ClientError.authResolution('The supplied credential is incomplete'));
		}
		return ok(this.credential);
	}
}

export interface StoredCredentialProviderOptions {
	readonly store: CredentialStore;
	readonly hostRecord: HostRecord;
	/** Overrides the principal saved in the host record */
	readonly principal?: string | undefined;
	/** Overrides the host saved in the host record */
	readonly host?: string | undefined;
}

/**
 * Reads the persisted host record and the principal's sealed secret.
 */
export class StoredCredentialProvider implements CredentialProvider {
	constructor(private readonly options: StoredCredentialProviderOptions) {}

	async resolve(): Promise<ClientResult<Credential>> {
		const record = await this.options.hostRecord.read();
		if (record.isErr()) return err(record.error);

		const host = this.options.host ?? record.value?.host;
		if (host === undefined) {
			return err(ClientError.authResolution('No service host configured', 'HOST_UNAVAILABLE'));
		}

		const principal = this.options.principal ?? record.value?.principal;
		if (principal === undefined) {
			return err(ClientError.authResolution('No principal configured'));
		}

		const secret = await this.options.store.load(principal);
		if (secret.isErr()) return err(secret.error);
		if (secret.value === null) {
			return err(ClientError.authResolution(`No stored credential for ${principal}`));
		}

		return ok({ principal, secret: secret.value, host: normalizeHost(host) });
	}
}

/**
 * Default store directory, `~/.accessgrant`.
 */
export function defaultStoreDir(): string {
	return join(homedir(), '.accessgrant');
}

/**
 * Build a StoredCredentialProvider from ACCESSGRANT_STORE_DIR,
 * ACCESSGRANT_STORE_KEY and ACCESSGRANT_HOST.
 */
export function createStoredCredentialProvider(
	env: Record<string, string | undefined> = process.env,
	principal?: string,
): StoredCredentialProvider {
	const parsed = loadClientEnv(env);
	const dir = parsed.ACCESSGRANT_STORE_DIR ?? defaultStoreDir();

	return new StoredCredentialProvider({
		store: new CredentialStore({ dir, sealer: new SecretSealer(parsed.ACCESSGRANT_STORE_KEY) }),
		hostRecord: new HostRecord(dir),
		principal,
		host: parsed.ACCESSGRANT_HOST,
	});
}
