import { DuplicateReviewError, type Repositories } from '../infrastructure/repositories/index.js'
import type { Listing } from '../common/pagination.js'
import type { Review, User } from '../types/models.js'
import { NON_FIELD_ERRORS, NotFoundError, ValidationError } from '../types/common.js'
import { purgeReviews } from './cascade.js'

export interface ReviewInput {
	text: string
	score: number
}

export const DUPLICATE_REVIEW_MESSAGE = 'You have already reviewed this title.'

function duplicateReview() {
	return ValidationError.forField(NON_FIELD_ERRORS, DUPLICATE_REVIEW_MESSAGE)
}

export class ReviewService {
	constructor(private readonly repositories: Repositories) {}

	async listForTitle(titleId: number): Promise<Listing<Review>> {
		await this.requireTitle(titleId)
		return this.repositories.reviews.listForTitle(titleId)
	}

	listForAuthor(authorId: number): Listing<Review> {
		return this.repositories.reviews.listForAuthor(authorId)
	}

	search(text: string): Listing<Review> {
		return this.repositories.reviews.search(text)
	}

	/** With `titleId`, a review filed under a different title counts as missing. */
	async find(reviewId: number, titleId?: number): Promise<Review | null> {
		const review = await this.repositories.reviews.findById(reviewId)
		if (!review || (titleId !== undefined && review.titleId !== titleId)) return null
		return review
	}

	async get(reviewId: number, titleId?: number): Promise<Review> {
		const review = await this.find(reviewId, titleId)
		if (!review) throw new NotFoundError()
		return review
	}

	/**
	 * One review per author and title. The lookup catches the common case;
	 * the unique index settles concurrent submissions.
	 */
	async create(titleId: number, author: User, input: ReviewInput): Promise<Review> {
		await this.requireTitle(titleId)
		if (await this.repositories.reviews.existsFor(author.id, titleId)) {
			throw duplicateReview()
		}
		try {
			return await this.repositories.reviews.create({ titleId, authorId: author.id, text: input.text, score: input.score })
		} catch (error) {
			if (error instanceof DuplicateReviewError) throw duplicateReview()
			throw error
		}
	}

	async update(review: Review, patch: Partial<ReviewInput>): Promise<Review> {
		const updated = await this.repositories.reviews.update(review.id, patch)
		if (!updated) throw new NotFoundError()
		return updated
	}

	async destroy(review: Review): Promise<void> {
		await purgeReviews(this.repositories, [review.id])
	}

	private async requireTitle(titleId: number) {
		if (!(await this.repositories.titles.findById(titleId))) throw new NotFoundError()
	}
}
