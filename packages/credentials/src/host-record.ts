import { join } from 'node:path';
import { err, ok } from 'neverthrow';
import { z } from 'zod';
import { ClientError, type ClientResult } from '@accessgrant/domain-core';
import { readJsonFile, writeJsonFile } from './json-file.js';

export const HOST_FILE = 'host.json';

export const HostRecordSchema = z.object({
	host: z
		.string()
		.url()
		.transform((v) => v.replace(/\/+$/, '')),
	principal: z.string().min(1).optional(),
});

export type HostRecordData = z.infer<typeof HostRecordSchema>;

/**
 * Persisted connection settings: which service to talk to and, optionally,
 * which stored principal to use by default.
 */
export class HostRecord {
	private readonly path: string;

	constructor(dir: string) {
		this.path = join(dir, HOST_FILE);
	}

	/**
	 * The saved record, or null when nothing was saved yet.
	 */
	read(): Promise<ClientResult<HostRecordData | null>> {
		return readJsonFile(this.path, HostRecordSchema, 'HOST_RECORD_UNREADABLE');
	}

	async write(record: z.input<typeof HostRecordSchema>): Promise<ClientResult<HostRecordData>> {
		const parsed = HostRecordSchema.safeParse(record);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			const field = issue?.path.join('.') || 'host';
			return err(
				ClientError.validation(field, 'INVALID_HOST_RECORD', `Invalid host record: ${issue?.message ?? 'rejected'}`),
			);
		}

		const written = await writeJsonFile(this.path, parsed.data, 'HOST_RECORD_UNWRITABLE');
		if (written.isErr()) return err(written.error);

		return ok(parsed.data);
	}
}
