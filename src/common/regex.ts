export function escapeRegExp(input: string) {
	return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** Mongo filter for a case-insensitive substring match. */
export function containsInsensitive(value: string) {
	return { $regex: escapeRegExp(value), $options: 'i' }
}
