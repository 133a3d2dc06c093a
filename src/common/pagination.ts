import { NotFoundError } from '../types/common.js'

/**
 * A lazily evaluated result set. Repositories hand these out so that callers
 * can count first and then fetch only the window they need.
 */
export interface Listing<T> {
	count(): Promise<number>
	slice(offset: number, limit: number): Promise<T[]>
}

export type PageRequest = number | 'last'

export interface Page<T> {
	items: T[]
	number: number
	numPages: number
	count: number
	pageSize: number
	hasNext: boolean
	hasPrevious: boolean
}

export function fromArray<T>(items: readonly T[]): Listing<T> {
	return {
		count: async () => items.length,
		slice: async (offset, limit) => items.slice(offset, offset + limit),
	}
}

export function emptyListing<T>(): Listing<T> {
	return fromArray<T>([])
}

/**
 * Parse the `page` query value. Missing or blank means the first page,
 * `last` is kept symbolic until the total is known.
 */
export function parsePageRequest(raw: unknown): PageRequest {
	if (raw == null || raw === '') return 1
	if (raw === 'last') return 'last'
	const value = typeof raw === 'number' ? raw : Number(raw)
	if (!Number.isInteger(value) || value < 1) {
		throw new NotFoundError('Invalid page.')
	}
	return value
}

export async function paginate<T>(listing: Listing<T>, request: PageRequest, pageSize: number): Promise<Page<T>> {
	const count = await listing.count()
	const numPages = Math.max(1, Math.ceil(count / pageSize))
	const number = request === 'last' ? numPages : request
	if (number > numPages) {
		throw new NotFoundError('Invalid page.')
	}

	const items = count > 0 ? await listing.slice((number - 1) * pageSize, pageSize) : []
	return {
		items,
		number,
		numPages,
		count,
		pageSize,
		hasNext: number < numPages,
		hasPrevious: number > 1,
	}
}
