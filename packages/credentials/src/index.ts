/**
 * @accessgrant/credentials
 *
 * Where the client's API key comes from:
 * - Credential providers (static, or read from the local store)
 * - Credential store with secrets sealed per principal (AES-256-GCM)
 * - Persisted host record
 */

export {
	StaticCredentialProvider,
	StoredCredentialProvider,
	createStoredCredentialProvider,
	defaultStoreDir,
	redactCredential,
	type Credential,
	type CredentialProvider,
	type StoredCredentialProviderOptions,
} from './providers.js';

export { CredentialStore, CREDENTIALS_FILE, type CredentialStoreOptions } from './credential-store.js';

export { HostRecord, HostRecordSchema, HOST_FILE, type HostRecordData } from './host-record.js';

export { SecretSealer, generateStoreKey, type SealError } from './secret-sealer.js';
