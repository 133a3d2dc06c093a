import { describe, it, expect, vi } from 'vitest'
import { fromArray, paginate, parsePageRequest, type Listing } from '../../common/pagination.js'
import { NotFoundError } from '../../types/common.js'

const numbers = (n: number) => Array.from({ length: n }, (_, i) => i + 1)

describe('parsePageRequest', () => {
	it('defaults to the first page', () => {
		expect(parsePageRequest(undefined)).toBe(1)
		expect(parsePageRequest('')).toBe(1)
	})

	it('keeps "last" symbolic', () => {
		expect(parsePageRequest('last')).toBe('last')
	})

	it('parses positive integers', () => {
		expect(parsePageRequest('3')).toBe(3)
	})

	it.each(['0', '-1', 'abc', '1.5'])('rejects %s as an invalid page', raw => {
		expect(() => parsePageRequest(raw)).toThrow(NotFoundError)
		expect(() => parsePageRequest(raw)).toThrow('Invalid page.')
	})
})

describe('paginate', () => {
	it('returns the requested window with navigation flags', async () => {
		const page = await paginate(fromArray(numbers(25)), 1, 10)
		expect(page.items).toEqual(numbers(10))
		expect(page).toMatchObject({ number: 1, numPages: 3, count: 25, hasNext: true, hasPrevious: false })
	})

	it('resolves "last" to the final page', async () => {
		const page = await paginate(fromArray(numbers(25)), 'last', 10)
		expect(page.number).toBe(3)
		expect(page.items).toEqual([21, 22, 23, 24, 25])
		expect(page.hasNext).toBe(false)
		expect(page.hasPrevious).toBe(true)
	})

	it('rejects pages past the end', async () => {
		await expect(paginate(fromArray(numbers(25)), 4, 10)).rejects.toThrow('Invalid page.')
	})

	it('treats an empty result as one empty page and never fetches', async () => {
		const slice = vi.fn(async () => [])
		const listing: Listing<number> = { count: async () => 0, slice }

		const page = await paginate(listing, 1, 10)

		expect(page).toMatchObject({ items: [], number: 1, numPages: 1, count: 0 })
		expect(slice).not.toHaveBeenCalled()
		await expect(paginate(listing, 2, 10)).rejects.toThrow(NotFoundError)
	})
})
