import type { Repositories } from '../infrastructure/repositories/index.js'

/**
 * Ownership cascades. Comments hang off reviews and reviews off titles, so
 * removal always runs child-first.
 */

export async function purgeReviews(repositories: Repositories, reviewIds: readonly number[]) {
	if (reviewIds.length === 0) return 0
	const comments = await repositories.comments.deleteForReviews(reviewIds)
	const reviews = await repositories.reviews.deleteMany(reviewIds)
	console.log(`🗑️ Removed ${reviews} review(s) and ${comments} comment(s)`)
	return reviews
}

export async function purgeTitles(repositories: Repositories, titleIds: readonly number[]) {
	if (titleIds.length === 0) return 0
	const reviewIds = await repositories.reviews.idsForTitles(titleIds)
	await purgeReviews(repositories, reviewIds)
	return repositories.titles.deleteMany(titleIds)
}

/** A user's reviews go together with every comment under them, then the user's own comments elsewhere. */
export async function purgeAuthor(repositories: Repositories, authorId: number) {
	const reviewIds = await repositories.reviews.idsForAuthor(authorId)
	await purgeReviews(repositories, reviewIds)
	await repositories.comments.deleteByAuthor(authorId)
}
