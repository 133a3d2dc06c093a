const DUPLICATE_KEY = 11000

/** True for the driver error raised when a unique index rejects a write. */
export function isDuplicateKeyError(error: unknown): boolean {
	return typeof error === 'object'
		&& error !== null
		&& 'code' in error
		&& error.code === DUPLICATE_KEY
}
