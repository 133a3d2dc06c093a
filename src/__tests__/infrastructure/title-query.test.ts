import { describe, it, expect } from 'vitest'
import { buildTitleMatch, buildTitlePipeline } from '../../infrastructure/repositories/TitleRepository.js'
import { isDuplicateKeyError } from '../../infrastructure/repositories/errors.js'
import { toTaxon } from '../../infrastructure/repositories/TaxonRepository.js'

describe('buildTitleMatch', () => {
	it('matches everything without filters', () => {
		expect(buildTitleMatch({})).toEqual({})
	})

	it('combines filters with AND and escapes the name', () => {
		expect(buildTitleMatch({ categoryId: 2, year: 1994, name: 'pulp (1994)' })).toEqual({
			categoryId: 2,
			year: 1994,
			name: { $regex: 'pulp \\(1994\\)', $options: 'i' },
		})
	})

	it('restricts to the titles bound to the requested genre', () => {
		expect(buildTitleMatch({ genreId: 4 }, [10, 11])).toEqual({ titleId: { $in: [10, 11] } })
		expect(buildTitleMatch({ genreId: 4 })).toEqual({ titleId: { $in: [] } })
	})
})

describe('buildTitlePipeline', () => {
	it('sorts newest first before paging', () => {
		const stages = buildTitlePipeline({ year: 2000 }, { offset: 20, limit: 10 })
		expect(stages.slice(0, 4)).toEqual([
			{ $match: { year: 2000 } },
			{ $sort: { year: -1, titleId: 1 } },
			{ $skip: 20 },
			{ $limit: 10 },
		])
	})

	it('averages review scores in the same query', () => {
		const stages = buildTitlePipeline({})
		expect(stages[2]).toEqual({
			$lookup: {
				from: 'reviews',
				let: { titleId: '$titleId' },
				pipeline: [
					{ $match: { $expr: { $eq: ['$titleId', '$$titleId'] } } },
					{ $group: { _id: null, rating: { $avg: '$score' } } },
				],
				as: 'ratingAgg',
			},
		})
	})

	it('joins categories and genres on their shared taxon id', () => {
		const stages = buildTitlePipeline({})
		expect(stages[3]).toEqual({ $lookup: { from: 'categories', localField: 'categoryId', foreignField: 'taxonId', as: 'categoryDocs' } })
		expect(stages[5]).toEqual({ $lookup: { from: 'genres', localField: 'bindings.genreId', foreignField: 'taxonId', as: 'genres' } })
	})

	it('omits paging stages for single lookups', () => {
		const stages = buildTitlePipeline({ titleId: 1 })
		expect(stages.some(stage => '$skip' in stage || '$limit' in stage)).toBe(false)
	})
})

describe('isDuplicateKeyError', () => {
	it('recognises the driver code for unique index violations', () => {
		expect(isDuplicateKeyError({ code: 11000, message: 'E11000 duplicate key error' })).toBe(true)
		expect(isDuplicateKeyError({ code: 121 })).toBe(false)
		expect(isDuplicateKeyError(new Error('boom'))).toBe(false)
		expect(isDuplicateKeyError(null)).toBe(false)
	})
})

describe('toTaxon', () => {
	it('maps a stored category or genre row', () => {
		expect(toTaxon({ taxonId: 7, name: 'Drama', slug: 'drama' })).toEqual({ id: 7, name: 'Drama', slug: 'drama' })
	})
})
