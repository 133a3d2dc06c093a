import type { FilterQuery, PipelineStage } from 'mongoose'
import { CommentModel, type CommentDocument } from '../models/Comment.js'
import { getNextSequence } from '../models/Sequence.js'
import type { Comment, NewComment } from '../../types/models.js'
import type { Listing } from '../../common/pagination.js'
import type { CommentRepository } from './types.js'

interface CommentRow {
	commentId: number
	reviewId: number
	authorId: number
	author: string | null
	text: string
	pubDate: Date
}

function commentPipeline(match: FilterQuery<CommentDocument>, window?: { offset: number; limit: number }): PipelineStage[] {
	const stages: PipelineStage[] = [
		{ $match: match },
		{ $sort: { pubDate: -1, commentId: -1 } },
	]
	if (window) stages.push({ $skip: window.offset }, { $limit: window.limit })
	stages.push(
		{ $lookup: { from: 'users', localField: 'authorId', foreignField: 'userId', as: 'authorDocs' } },
		{
			$project: {
				_id: 0,
				commentId: 1,
				reviewId: 1,
				authorId: 1,
				text: 1,
				pubDate: 1,
				author: { $ifNull: [{ $first: '$authorDocs.username' }, null] },
			},
		},
	)
	return stages
}

function toComment(row: CommentRow): Comment {
	return {
		id: row.commentId,
		reviewId: row.reviewId,
		authorId: row.authorId,
		author: row.author ?? '',
		text: row.text,
		pubDate: row.pubDate,
	}
}

export class MongoCommentRepository implements CommentRepository {
	listForReview(reviewId: number): Listing<Comment> {
		return {
			count: () => CommentModel.countDocuments({ reviewId }),
			slice: async (offset, limit) => {
				const rows = await CommentModel.aggregate<CommentRow>(commentPipeline({ reviewId }, { offset, limit }))
				return rows.map(toComment)
			},
		}
	}

	async findById(id: number) {
		const [row] = await CommentModel.aggregate<CommentRow>(commentPipeline({ commentId: id }))
		return row ? toComment(row) : null
	}

	async create(data: NewComment) {
		const commentId = await getNextSequence('commentId')
		await CommentModel.create({ commentId, ...data, pubDate: new Date() })
		const created = await this.findById(commentId)
		if (!created) throw new Error(`Comment ${commentId} vanished after insert`)
		return created
	}

	async update(id: number, patch: { text?: string }) {
		const result = await CommentModel.updateOne({ commentId: id }, { $set: patch }, { runValidators: true })
		if (result.matchedCount === 0) return null
		return this.findById(id)
	}

	async deleteForReviews(reviewIds: readonly number[]) {
		if (reviewIds.length === 0) return 0
		const result = await CommentModel.deleteMany({ reviewId: { $in: [...reviewIds] } })
		return result.deletedCount
	}

	async deleteByAuthor(authorId: number) {
		const result = await CommentModel.deleteMany({ authorId })
		return result.deletedCount
	}

	async delete(id: number) {
		const result = await CommentModel.deleteOne({ commentId: id })
		return result.deletedCount > 0
	}
}
