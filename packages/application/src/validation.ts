/**
 * Validation Utilities
 *
 * Helper functions for validating command input before any network call.
 * All validation functions return ClientResult types for consistent error handling.
 *
 * @example
 * ```typescript
 * // In a use case:
 * const path = validateRequired(command.path, 'path', 'PATH_REQUIRED');
 * if (path.isErr()) return err(path.error);
 *
 * const options = validateWithSchema(AgentOptionsSchema, command.options, 'options', 'INVALID_AGENT_OPTIONS');
 * if (options.isErr()) return err(options.error);
 * ```
 */

import { err, ok } from 'neverthrow';
import type { z } from 'zod';
import { ClientError, type ClientResult } from '@accessgrant/domain-core';

/**
 * Validate that a value is not null, undefined, or empty string.
 *
 * @param fieldName - The field name for error details
 * @param errorCode - The error code if validation fails
 * @param errorMessage - Optional custom error message
 */
export function validateRequired<T>(
	value: T | null | undefined,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): ClientResult<NonNullable<T>> {
	if (value === null || value === undefined) {
		return err(ClientError.validation(fieldName, errorCode, errorMessage ?? `${fieldName} is required`));
	}

	if (typeof value === 'string' && value.trim() === '') {
		return err(ClientError.validation(fieldName, errorCode, errorMessage ?? `${fieldName} is required`));
	}

	return ok(value);
}

/**
 * Validate that a string does not exceed a maximum length.
 */
export function validateMaxLength(
	value: string,
	maxLength: number,
	fieldName: string,
	errorCode: string,
): ClientResult<string> {
	if (value.length > maxLength) {
		return err(
			ClientError.validation(fieldName, errorCode, `${fieldName} must be ${maxLength} characters or less`, {
				length: value.length,
				maxLength,
			}),
		);
	}

	return ok(value);
}

/**
 * Validate that a value is a positive integer id.
 */
export function validateId(value: number, fieldName: string, errorCode: string): ClientResult<number> {
	if (!Number.isInteger(value) || value <= 0) {
		return err(
			ClientError.validation(fieldName, errorCode, `${fieldName} must be a positive integer`, { value }),
		);
	}

	return ok(value);
}

/**
 * Validate a value against a zod schema. Every issue is listed in the
 * message as `path: message`; the first issue's path names the field.
 *
 * @returns Ok with the parsed (and defaulted) value, or a validation error
 */
export function validateWithSchema<S extends z.ZodTypeAny>(
	schema: S,
	value: unknown,
	fieldName: string,
	errorCode: string,
): ClientResult<z.output<S>> {
	const result = schema.safeParse(value);
	if (result.success) {
		return ok(result.data);
	}

	const issues = result.error.issues.map((issue) => {
		const path = [fieldName, ...issue.path.map(String)].join('.');
		return `${path}: ${issue.message}`;
	});
	const firstPath = result.error.issues[0]?.path ?? [];
	const field = [fieldName, ...firstPath.map(String)].join('.');

	return err(ClientError.validation(field, errorCode, `Invalid ${fieldName}: ${issues.join('; ')}`, { issues }));
}

/**
 * Chain multiple validations together.
 * Stops at the first failure.
 *
 * @example
 * ```typescript
 * const result = validateAll(
 *     () => validateRequired(command.group, 'group', 'GROUP_REQUIRED'),
 *     () => validateMaxLength(command.group, 128, 'group', 'GROUP_TOO_LONG'),
 * );
 * if (result.isErr()) return err(result.error);
 * ```
 */
export function validateAll(...validations: Array<() => ClientResult<unknown>>): ClientResult<void> {
	for (const validation of validations) {
		const result = validation();
		if (result.isErr()) {
			return err(result.error);
		}
	}

	return ok(undefined);
}
