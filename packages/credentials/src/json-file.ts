import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ResultAsync, err, ok } from 'neverthrow';
import type { z } from 'zod';
import { ClientError, type ClientResult } from '@accessgrant/domain-core';

function isMissingFile(e: unknown): boolean {
	return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

function describeFailure(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

/**
 * Read and validate a JSON file. A missing file is Ok(null); an unreadable
 * or malformed one is an auth_resolution error with the given code.
 */
export async function readJsonFile<S extends z.ZodTypeAny>(
	path: string,
	schema: S,
	errorCode: string,
): Promise<ClientResult<z.output<S> | null>> {
	let raw: string;
	try {
		raw = await readFile(path, 'utf-8');
	} catch (e) {
		if (isMissingFile(e)) {
			return ok(null);
		}
		return err(ClientError.authResolution(`Cannot read ${path}: ${describeFailure(e)}`, errorCode));
	}

	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (e) {
		return err(ClientError.authResolution(`${path} is not valid JSON: ${describeFailure(e)}`, errorCode));
	}

	const parsed = schema.safeParse(json);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
		return err(ClientError.authResolution(`${path} has an unexpected shape: ${issues.join('; ')}`, errorCode));
	}

	return ok(parsed.data);
}

/**
 * Write a JSON file readable by the owner only, creating its directory.
 */
export function writeJsonFile(path: string, value: unknown, errorCode: string): ResultAsync<void, ClientError> {
	const write = async (): Promise<void> => {
		await mkdir(dirname(path), { recursive: true, mode: 0o700 });
		await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
	};

	return ResultAsync.fromPromise(write(), (e) =>
		ClientError.authResolution(`Cannot write ${path}: ${describeFailure(e)}`, errorCode),
	);
}
