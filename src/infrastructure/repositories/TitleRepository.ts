import type { FilterQuery, PipelineStage } from 'mongoose'
import { TitleModel, type TitleDocument } from '../models/Title.js'
import { GenreTitleModel } from '../models/GenreTitle.js'
import { getNextSequence } from '../models/Sequence.js'
import type { TitleData, TitleFilter, TitleView } from '../../types/models.js'
import type { Listing } from '../../common/pagination.js'
import { containsInsensitive } from '../../common/regex.js'
import type { TitleRepository } from './types.js'

interface TaxonRow {
	taxonId: number
	name: string
	slug: string
}

interface TitleRow {
	titleId: number
	name: string
	year: number
	description?: string | null
	rating: number | null
	category: TaxonRow | null
	genres: TaxonRow[]
}

type TitleMatch = FilterQuery<TitleDocument>

/**
 * Translate listing filters into a `$match` document. Genre filtering goes
 * through the join collection, so the caller passes the title ids bound to
 * the requested genre.
 */
export function buildTitleMatch(filter: TitleFilter, genreTitleIds?: readonly number[]): TitleMatch {
	const match: TitleMatch = {}
	if (filter.categoryId !== undefined) match.categoryId = filter.categoryId
	if (filter.year !== undefined) match.year = filter.year
	if (filter.name) match.name = containsInsensitive(filter.name)
	if (filter.genreId !== undefined) match.titleId = { $in: [...(genreTitleIds ?? [])] }
	return match
}

/**
 * Titles joined with category, genres and the mean score of their reviews.
 * The average is computed by the store in the same aggregation, so a read
 * reflects the reviews committed when it runs.
 */
export function buildTitlePipeline(match: TitleMatch, window?: { offset: number; limit: number }): PipelineStage[] {
	const stages: PipelineStage[] = [
		{ $match: match },
		{ $sort: { year: -1, titleId: 1 } },
	]
	if (window) {
		stages.push({ $skip: window.offset }, { $limit: window.limit })
	}
	stages.push(
		{
			$lookup: {
				from: 'reviews',
				let: { titleId: '$titleId' },
				pipeline: [
					{ $match: { $expr: { $eq: ['$titleId', '$$titleId'] } } },
					{ $group: { _id: null, rating: { $avg: '$score' } } },
				],
				as: 'ratingAgg',
			},
		},
		{ $lookup: { from: 'categories', localField: 'categoryId', foreignField: 'taxonId', as: 'categoryDocs' } },
		{ $lookup: { from: 'genre-titles', localField: 'titleId', foreignField: 'titleId', as: 'bindings' } },
		{ $lookup: { from: 'genres', localField: 'bindings.genreId', foreignField: 'taxonId', as: 'genres' } },
		{
			$project: {
				_id: 0,
				titleId: 1,
				name: 1,
				year: 1,
				description: 1,
				rating: { $ifNull: [{ $first: '$ratingAgg.rating' }, null] },
				category: { $ifNull: [{ $first: '$categoryDocs' }, null] },
				genres: 1,
			},
		},
	)
	return stages
}

function toTitleView(row: TitleRow): TitleView {
	return {
		id: row.titleId,
		name: row.name,
		year: row.year,
		description: row.description ?? null,
		rating: row.rating,
		category: {
			id: row.category?.taxonId ?? 0,
			name: row.category?.name ?? '',
			slug: row.category?.slug ?? '',
		},
		genres: row.genres
			.map(genre => ({ id: genre.taxonId, name: genre.name, slug: genre.slug }))
			.sort((a, b) => a.slug.localeCompare(b.slug)),
	}
}

export class MongoTitleRepository implements TitleRepository {
	list(filter: TitleFilter = {}): Listing<TitleView> {
		let matchPromise: Promise<TitleMatch> | null = null
		const match = () => {
			matchPromise ??= this.resolveMatch(filter)
			return matchPromise
		}
		return {
			count: async () => TitleModel.countDocuments(await match()),
			slice: async (offset, limit) => {
				const rows = await TitleModel.aggregate<TitleRow>(buildTitlePipeline(await match(), { offset, limit }))
				return rows.map(toTitleView)
			},
		}
	}

	private async resolveMatch(filter: TitleFilter): Promise<TitleMatch> {
		if (filter.genreId === undefined) return buildTitleMatch(filter)
		const bindings = await GenreTitleModel.find({ genreId: filter.genreId }).select('titleId').lean<Array<{ titleId: number }>>()
		return buildTitleMatch(filter, bindings.map(binding => binding.titleId))
	}

	async findById(id: number) {
		const [row] = await TitleModel.aggregate<TitleRow>(buildTitlePipeline({ titleId: id }))
		return row ? toTitleView(row) : null
	}

	async create(data: TitleData) {
		const titleId = await getNextSequence('titleId')
		await TitleModel.create({
			titleId,
			name: data.name,
			year: data.year,
			categoryId: data.categoryId,
			description: data.description,
		})
		await this.bindGenres(titleId, data.genreIds)
		const created = await this.findById(titleId)
		if (!created) throw new Error(`Title ${titleId} vanished after insert`)
		return created
	}

	async update(id: number, patch: Partial<TitleData>) {
		const { genreIds, ...fields } = patch
		const result = await TitleModel.updateOne({ titleId: id }, { $set: fields }, { runValidators: true })
		if (result.matchedCount === 0) return null
		if (genreIds !== undefined) {
			await GenreTitleModel.deleteMany({ titleId: id })
			await this.bindGenres(id, genreIds)
		}
		return this.findById(id)
	}

	private async bindGenres(titleId: number, genreIds: readonly number[]) {
		const unique = [...new Set(genreIds)]
		if (unique.length === 0) return
		await GenreTitleModel.insertMany(unique.map(genreId => ({ genreId, titleId })))
	}

	async idsForCategory(categoryId: number) {
		const rows = await TitleModel.find({ categoryId }).select('titleId').lean<Array<{ titleId: number }>>()
		return rows.map(row => row.titleId)
	}

	async countForCategory(categoryId: number) {
		return TitleModel.countDocuments({ categoryId })
	}

	async unbindGenre(genreId: number) {
		await GenreTitleModel.deleteMany({ genreId })
	}

	async deleteMany(ids: readonly number[]) {
		if (ids.length === 0) return 0
		await GenreTitleModel.deleteMany({ titleId: { $in: [...ids] } })
		const result = await TitleModel.deleteMany({ titleId: { $in: [...ids] } })
		return result.deletedCount
	}
}
