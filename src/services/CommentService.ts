import type { Repositories } from '../infrastructure/repositories/index.js'
import type { Listing } from '../common/pagination.js'
import type { Comment, Review, User } from '../types/models.js'
import { NotFoundError } from '../types/common.js'

export class CommentService {
	constructor(private readonly repositories: Repositories) {}

	listForReview(review: Review): Listing<Comment> {
		return this.repositories.comments.listForReview(review.id)
	}

	async find(reviewId: number, commentId: number): Promise<Comment | null> {
		const comment = await this.repositories.comments.findById(commentId)
		return comment && comment.reviewId === reviewId ? comment : null
	}

	async get(review: Review, commentId: number): Promise<Comment> {
		const comment = await this.find(review.id, commentId)
		if (!comment) throw new NotFoundError()
		return comment
	}

	async create(review: Review, author: User, text: string): Promise<Comment> {
		return this.repositories.comments.create({ reviewId: review.id, authorId: author.id, text })
	}

	async update(comment: Comment, patch: { text?: string }): Promise<Comment> {
		const updated = await this.repositories.comments.update(comment.id, patch)
		if (!updated) throw new NotFoundError()
		return updated
	}

	async destroy(comment: Comment): Promise<void> {
		await this.repositories.comments.delete(comment.id)
	}
}
