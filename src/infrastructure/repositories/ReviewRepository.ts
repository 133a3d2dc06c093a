import type { FilterQuery, PipelineStage } from 'mongoose'
import { ReviewModel, type ReviewDocument } from '../models/Review.js'
import { getNextSequence } from '../models/Sequence.js'
import type { NewReview, Review } from '../../types/models.js'
import type { Listing } from '../../common/pagination.js'
import { containsInsensitive } from '../../common/regex.js'
import { isDuplicateKeyError } from './errors.js'
import { DuplicateReviewError, type ReviewRepository } from './types.js'

interface ReviewRow {
	reviewId: number
	titleId: number
	authorId: number
	author: string | null
	text: string
	score: number
	pubDate: Date
}

type ReviewMatch = FilterQuery<ReviewDocument>

function reviewPipeline(match: ReviewMatch, window?: { offset: number; limit: number }): PipelineStage[] {
	const stages: PipelineStage[] = [
		{ $match: match },
		{ $sort: { pubDate: -1, reviewId: -1 } },
	]
	if (window) stages.push({ $skip: window.offset }, { $limit: window.limit })
	stages.push(
		{ $lookup: { from: 'users', localField: 'authorId', foreignField: 'userId', as: 'authorDocs' } },
		{
			$project: {
				_id: 0,
				reviewId: 1,
				titleId: 1,
				authorId: 1,
				text: 1,
				score: 1,
				pubDate: 1,
				author: { $ifNull: [{ $first: '$authorDocs.username' }, null] },
			},
		},
	)
	return stages
}

function toReview(row: ReviewRow): Review {
	return {
		id: row.reviewId,
		titleId: row.titleId,
		authorId: row.authorId,
		author: row.author ?? '',
		text: row.text,
		score: row.score,
		pubDate: row.pubDate,
	}
}

function listing(match: ReviewMatch): Listing<Review> {
	return {
		count: () => ReviewModel.countDocuments(match),
		slice: async (offset, limit) => {
			const rows = await ReviewModel.aggregate<ReviewRow>(reviewPipeline(match, { offset, limit }))
			return rows.map(toReview)
		},
	}
}

export class MongoReviewRepository implements ReviewRepository {
	listForTitle(titleId: number) {
		return listing({ titleId })
	}

	listForAuthor(authorId: number) {
		return listing({ authorId })
	}

	search(text: string) {
		return listing({ text: containsInsensitive(text) })
	}

	async findById(id: number) {
		const [row] = await ReviewModel.aggregate<ReviewRow>(reviewPipeline({ reviewId: id }))
		return row ? toReview(row) : null
	}

	async existsFor(authorId: number, titleId: number) {
		return (await ReviewModel.exists({ authorId, titleId })) !== null
	}

	async create(data: NewReview) {
		const reviewId = await getNextSequence('reviewId')
		try {
			await ReviewModel.create({ reviewId, ...data, pubDate: new Date() })
		} catch (error) {
			if (isDuplicateKeyError(error)) throw new DuplicateReviewError(data.authorId, data.titleId)
			throw error
		}
		const created = await this.findById(reviewId)
		if (!created) throw new Error(`Review ${reviewId} vanished after insert`)
		return created
	}

	async update(id: number, patch: { text?: string; score?: number }) {
		const result = await ReviewModel.updateOne({ reviewId: id }, { $set: patch }, { runValidators: true })
		if (result.matchedCount === 0) return null
		return this.findById(id)
	}

	async idsForTitles(titleIds: readonly number[]) {
		if (titleIds.length === 0) return []
		const rows = await ReviewModel.find({ titleId: { $in: [...titleIds] } }).select('reviewId').lean<Array<{ reviewId: number }>>()
		return rows.map(row => row.reviewId)
	}

	async idsForAuthor(authorId: number) {
		const rows = await ReviewModel.find({ authorId }).select('reviewId').lean<Array<{ reviewId: number }>>()
		return rows.map(row => row.reviewId)
	}

	async deleteMany(ids: readonly number[]) {
		if (ids.length === 0) return 0
		const result = await ReviewModel.deleteMany({ reviewId: { $in: [...ids] } })
		return result.deletedCount
	}
}
