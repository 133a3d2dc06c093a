import { z } from 'zod'
import type { Comment, Review } from '../../types/models.js'
import { score, text } from './fields.js'

export const reviewCreateSchema = z.object({
	text: text(),
	score: score(),
})
export const reviewPatchSchema = reviewCreateSchema.partial()

export const commentCreateSchema = z.object({
	text: text(),
})
export const commentPatchSchema = commentCreateSchema.partial()

export function reviewRepresentation(review: Review) {
	return {
		id: review.id,
		author: review.author,
		text: review.text,
		score: review.score,
		pub_date: review.pubDate.toISOString(),
	}
}

export function commentRepresentation(comment: Comment) {
	return {
		id: comment.id,
		review: comment.reviewId,
		author: comment.author,
		text: comment.text,
		pub_date: comment.pubDate.toISOString(),
	}
}
