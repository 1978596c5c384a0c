import type { IoError, Result } from "@/src/core/types/errors"

export type { IoError } from "@/src/core/types/errors"

export type IoResult<T> = Result<T, IoError>

export function ioFailure<T>(
	message: string,
	path: string,
	operation: string,
	rawError?: Error,
): IoResult<T> {
	return {
		error: {
			message,
			operation,
			path,
			rawError,
			type: "io",
		},
		ok: false,
	}
}
