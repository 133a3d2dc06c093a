import type { Listing } from '../../common/pagination.js'
import type {
	Comment,
	NewComment,
	NewReview,
	NewUser,
	Review,
	Taxon,
	TitleData,
	TitleFilter,
	TitleView,
	User,
	UserPatch,
} from '../../types/models.js'

/**
 * Storage contracts. Each entity gets one repository with named queries;
 * services never reach into the models directly.
 */

export interface UserRepository {
	list(search?: string): Listing<User>
	findById(id: number): Promise<User | null>
	findByUsername(username: string): Promise<User | null>
	findByEmail(email: string): Promise<User | null>
	create(data: NewUser): Promise<User>
	update(id: number, patch: UserPatch): Promise<User | null>
	delete(id: number): Promise<boolean>
}

export interface TaxonRepository {
	list(search?: string): Listing<Taxon>
	findBySlug(slug: string): Promise<Taxon | null>
	findBySlugs(slugs: readonly string[]): Promise<Taxon[]>
	create(data: { name: string; slug: string }): Promise<Taxon>
	delete(id: number): Promise<boolean>
}

export interface TitleRepository {
	list(filter?: TitleFilter): Listing<TitleView>
	findById(id: number): Promise<TitleView | null>
	create(data: TitleData): Promise<TitleView>
	update(id: number, patch: Partial<TitleData>): Promise<TitleView | null>
	idsForCategory(categoryId: number): Promise<number[]>
	countForCategory(categoryId: number): Promise<number>
	/** Drops the genre from every title it is bound to. */
	unbindGenre(genreId: number): Promise<void>
	/** Removes the titles and their genre bindings. */
	deleteMany(ids: readonly number[]): Promise<number>
}

export interface ReviewRepository {
	listForTitle(titleId: number): Listing<Review>
	listForAuthor(authorId: number): Listing<Review>
	search(text: string): Listing<Review>
	findById(id: number): Promise<Review | null>
	existsFor(authorId: number, titleId: number): Promise<boolean>
	/** @throws DuplicateReviewError when the author already reviewed the title */
	create(data: NewReview): Promise<Review>
	update(id: number, patch: { text?: string; score?: number }): Promise<Review | null>
	idsForTitles(titleIds: readonly number[]): Promise<number[]>
	idsForAuthor(authorId: number): Promise<number[]>
	deleteMany(ids: readonly number[]): Promise<number>
}

export interface CommentRepository {
	listForReview(reviewId: number): Listing<Comment>
	findById(id: number): Promise<Comment | null>
	create(data: NewComment): Promise<Comment>
	update(id: number, patch: { text?: string }): Promise<Comment | null>
	deleteForReviews(reviewIds: readonly number[]): Promise<number>
	deleteByAuthor(authorId: number): Promise<number>
	delete(id: number): Promise<boolean>
}

export interface Repositories {
	users: UserRepository
	categories: TaxonRepository
	genres: TaxonRepository
	titles: TitleRepository
	reviews: ReviewRepository
	comments: CommentRepository
}

/** Raised by the store when the `(author, title)` unique index rejects an insert. */
export class DuplicateReviewError extends Error {
	constructor(public authorId: number, public titleId: number) {
		super(`Review by user ${authorId} for title ${titleId} already exists`)
		Object.setPrototypeOf(this, DuplicateReviewError.prototype)
	}
}

/** Raised by the store when the unique slug index rejects an insert. */
export class DuplicateSlugError extends Error {
	constructor(public kind: string, public slug: string) {
		super(`A ${kind} with slug "${slug}" already exists`)
		Object.setPrototypeOf(this, DuplicateSlugError.prototype)
	}
}
