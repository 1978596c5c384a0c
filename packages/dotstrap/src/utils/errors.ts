export function formatError(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}

	if (typeof error === "object" && error !== null && "message" in error) {
		const message = (error as { message?: unknown }).message
		if (typeof message === "string" && message.trim()) {
			return message
		}
	}

	return String(error)
}

export function toError(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined
}
