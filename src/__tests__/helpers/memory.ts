import type { MailMessage, Mailer } from '../../infrastructure/EmailTool.js'
import {
	DuplicateReviewError,
	DuplicateSlugError,
	type CommentRepository,
	type Repositories,
	type ReviewRepository,
	type TaxonRepository,
	type TitleRepository,
	type UserRepository,
} from '../../infrastructure/repositories/index.js'
import { fromArray, type Listing } from '../../common/pagination.js'
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

/** Stand-in for the Mongo repositories with the same ordering rules. */

const includes = (haystack: string, needle: string) => haystack.toLowerCase().includes(needle.toLowerCase())

interface StoredTitle extends TitleData {
	id: number
}

interface StoredReview extends NewReview {
	id: number
	pubDate: Date
}

interface StoredComment extends NewComment {
	id: number
	pubDate: Date
}

export class MemoryStore {
	users: User[] = []
	categories: Taxon[] = []
	genres: Taxon[] = []
	titles: StoredTitle[] = []
	reviews: StoredReview[] = []
	comments: StoredComment[] = []
	private sequence = 0
	private clock = Date.UTC(2024, 0, 1)

	nextId() {
		return ++this.sequence
	}

	/** Strictly increasing timestamps keep "newest first" deterministic. */
	tick() {
		this.clock += 1000
		return new Date(this.clock)
	}

	username(authorId: number) {
		return this.users.find(user => user.id === authorId)?.username ?? ''
	}
}

class MemoryUserRepository implements UserRepository {
	constructor(private readonly store: MemoryStore) {}

	list(search?: string): Listing<User> {
		const rows = this.store.users.filter(user => !search || includes(user.username, search))
		return fromArray([...rows].sort((a, b) => a.id - b.id))
	}

	async findById(id: number) {
		return this.store.users.find(user => user.id === id) ?? null
	}

	async findByUsername(username: string) {
		return this.store.users.find(user => user.username === username) ?? null
	}

	async findByEmail(email: string) {
		return this.store.users.find(user => user.email === email) ?? null
	}

	async create(data: NewUser) {
		const user: User = {
			id: this.store.nextId(),
			username: data.username,
			email: data.email,
			firstName: data.firstName ?? '',
			lastName: data.lastName ?? '',
			bio: data.bio ?? null,
			role: data.role ?? 'user',
			isStaff: data.isStaff ?? false,
			confirmationCode: data.confirmationCode ?? null,
			passwordHash: data.passwordHash ?? null,
			dateJoined: this.store.tick(),
		}
		this.store.users.push(user)
		return user
	}

	async update(id: number, patch: UserPatch) {
		const index = this.store.users.findIndex(user => user.id === id)
		const current = this.store.users[index]
		if (!current) return null
		const updated: User = { ...current }
		if (patch.username !== undefined) updated.username = patch.username
		if (patch.email !== undefined) updated.email = patch.email
		if (patch.firstName !== undefined) updated.firstName = patch.firstName
		if (patch.lastName !== undefined) updated.lastName = patch.lastName
		if (patch.bio !== undefined) updated.bio = patch.bio
		if (patch.role !== undefined) updated.role = patch.role
		if (patch.confirmationCode !== undefined) updated.confirmationCode = patch.confirmationCode
		if (patch.passwordHash !== undefined) updated.passwordHash = patch.passwordHash
		this.store.users[index] = updated
		return updated
	}

	async delete(id: number) {
		const before = this.store.users.length
		this.store.users = this.store.users.filter(user => user.id !== id)
		return this.store.users.length < before
	}
}

class MemoryTaxonRepository implements TaxonRepository {
	constructor(private readonly store: MemoryStore, private readonly key: 'categories' | 'genres') {}

	list(search?: string): Listing<Taxon> {
		const rows = this.store[this.key].filter(taxon => !search || includes(taxon.name, search))
		return fromArray([...rows].sort((a, b) => a.name.localeCompare(b.name) || a.id - b.id))
	}

	async findBySlug(slug: string) {
		return this.store[this.key].find(taxon => taxon.slug === slug) ?? null
	}

	async findBySlugs(slugs: readonly string[]) {
		return this.store[this.key].filter(taxon => slugs.includes(taxon.slug))
	}

	async create(data: { name: string; slug: string }) {
		if (this.store[this.key].some(taxon => taxon.slug === data.slug)) {
			throw new DuplicateSlugError(this.key, data.slug)
		}
		const taxon: Taxon = { id: this.store.nextId(), name: data.name, slug: data.slug }
		this.store[this.key].push(taxon)
		return taxon
	}

	async delete(id: number) {
		const before = this.store[this.key].length
		this.store[this.key] = this.store[this.key].filter(taxon => taxon.id !== id)
		return this.store[this.key].length < before
	}
}

class MemoryTitleRepository implements TitleRepository {
	constructor(private readonly store: MemoryStore) {}

	private view(title: StoredTitle): TitleView {
		const scores = this.store.reviews.filter(review => review.titleId === title.id).map(review => review.score)
		const category = this.store.categories.find(taxon => taxon.id === title.categoryId)
		return {
			id: title.id,
			name: title.name,
			year: title.year,
			description: title.description,
			rating: scores.length > 0 ? scores.reduce((sum, score) => sum + score, 0) / scores.length : null,
			category: category ?? { id: 0, name: '', slug: '' },
			genres: this.store.genres
				.filter(genre => title.genreIds.includes(genre.id))
				.sort((a, b) => a.slug.localeCompare(b.slug)),
		}
	}

	list(filter: TitleFilter = {}): Listing<TitleView> {
		const rows = this.store.titles.filter(title =>
			(filter.categoryId === undefined || title.categoryId === filter.categoryId)
			&& (filter.genreId === undefined || title.genreIds.includes(filter.genreId))
			&& (filter.year === undefined || title.year === filter.year)
			&& (!filter.name || includes(title.name, filter.name)))
		const sorted = [...rows].sort((a, b) => b.year - a.year || a.id - b.id)
		return {
			count: async () => sorted.length,
			slice: async (offset, limit) => sorted.slice(offset, offset + limit).map(title => this.view(title)),
		}
	}

	async findById(id: number) {
		const title = this.store.titles.find(row => row.id === id)
		return title ? this.view(title) : null
	}

	async create(data: TitleData) {
		const title: StoredTitle = { ...data, genreIds: [...new Set(data.genreIds)], id: this.store.nextId() }
		this.store.titles.push(title)
		return this.view(title)
	}

	async update(id: number, patch: Partial<TitleData>) {
		const title = this.store.titles.find(row => row.id === id)
		if (!title) return null
		Object.assign(title, patch)
		return this.view(title)
	}

	async idsForCategory(categoryId: number) {
		return this.store.titles.filter(title => title.categoryId === categoryId).map(title => title.id)
	}

	async countForCategory(categoryId: number) {
		return this.store.titles.filter(title => title.categoryId === categoryId).length
	}

	async unbindGenre(genreId: number) {
		for (const title of this.store.titles) {
			title.genreIds = title.genreIds.filter(id => id !== genreId)
		}
	}

	async deleteMany(ids: readonly number[]) {
		const before = this.store.titles.length
		this.store.titles = this.store.titles.filter(title => !ids.includes(title.id))
		return before - this.store.titles.length
	}
}

class MemoryReviewRepository implements ReviewRepository {
	constructor(private readonly store: MemoryStore) {}

	private view(review: StoredReview): Review {
		return { ...review, author: this.store.username(review.authorId) }
	}

	private listing(predicate: (review: StoredReview) => boolean): Listing<Review> {
		const rows = this.store.reviews
			.filter(predicate)
			.sort((a, b) => b.pubDate.getTime() - a.pubDate.getTime() || b.id - a.id)
		return fromArray(rows.map(review => this.view(review)))
	}

	listForTitle(titleId: number) {
		return this.listing(review => review.titleId === titleId)
	}

	listForAuthor(authorId: number) {
		return this.listing(review => review.authorId === authorId)
	}

	search(text: string) {
		return this.listing(review => includes(review.text, text))
	}

	async findById(id: number) {
		const review = this.store.reviews.find(row => row.id === id)
		return review ? this.view(review) : null
	}

	async existsFor(authorId: number, titleId: number) {
		return this.store.reviews.some(review => review.authorId === authorId && review.titleId === titleId)
	}

	/** Enforces the unique (author, title) pair like the store index does. */
	async create(data: NewReview) {
		if (await this.existsFor(data.authorId, data.titleId)) {
			throw new DuplicateReviewError(data.authorId, data.titleId)
		}
		const review: StoredReview = { ...data, id: this.store.nextId(), pubDate: this.store.tick() }
		this.store.reviews.push(review)
		return this.view(review)
	}

	async update(id: number, patch: { text?: string; score?: number }) {
		const review = this.store.reviews.find(row => row.id === id)
		if (!review) return null
		Object.assign(review, patch)
		return this.view(review)
	}

	async idsForTitles(titleIds: readonly number[]) {
		return this.store.reviews.filter(review => titleIds.includes(review.titleId)).map(review => review.id)
	}

	async idsForAuthor(authorId: number) {
		return this.store.reviews.filter(review => review.authorId === authorId).map(review => review.id)
	}

	async deleteMany(ids: readonly number[]) {
		const before = this.store.reviews.length
		this.store.reviews = this.store.reviews.filter(review => !ids.includes(review.id))
		return before - this.store.reviews.length
	}
}

class MemoryCommentRepository implements CommentRepository {
	constructor(private readonly store: MemoryStore) {}

	private view(comment: StoredComment): Comment {
		return { ...comment, author: this.store.username(comment.authorId) }
	}

	listForReview(reviewId: number) {
		const rows = this.store.comments
			.filter(comment => comment.reviewId === reviewId)
			.sort((a, b) => b.pubDate.getTime() - a.pubDate.getTime() || b.id - a.id)
		return fromArray(rows.map(comment => this.view(comment)))
	}

	async findById(id: number) {
		const comment = this.store.comments.find(row => row.id === id)
		return comment ? this.view(comment) : null
	}

	async create(data: NewComment) {
		const comment: StoredComment = { ...data, id: this.store.nextId(), pubDate: this.store.tick() }
		this.store.comments.push(comment)
		return this.view(comment)
	}

	async update(id: number, patch: { text?: string }) {
		const comment = this.store.comments.find(row => row.id === id)
		if (!comment) return null
		Object.assign(comment, patch)
		return this.view(comment)
	}

	async deleteForReviews(reviewIds: readonly number[]) {
		const before = this.store.comments.length
		this.store.comments = this.store.comments.filter(comment => !reviewIds.includes(comment.reviewId))
		return before - this.store.comments.length
	}

	async deleteByAuthor(authorId: number) {
		const before = this.store.comments.length
		this.store.comments = this.store.comments.filter(comment => comment.authorId !== authorId)
		return before - this.store.comments.length
	}

	async delete(id: number) {
		const before = this.store.comments.length
		this.store.comments = this.store.comments.filter(comment => comment.id !== id)
		return this.store.comments.length < before
	}
}

export function createMemoryRepositories(store = new MemoryStore()): Repositories {
	return {
		users: new MemoryUserRepository(store),
		categories: new MemoryTaxonRepository(store, 'categories'),
		genres: new MemoryTaxonRepository(store, 'genres'),
		titles: new MemoryTitleRepository(store),
		reviews: new MemoryReviewRepository(store),
		comments: new MemoryCommentRepository(store),
	}
}

export class RecordingMailer implements Mailer {
	sent: MailMessage[] = []

	async send(message: MailMessage) {
		this.sent.push(message)
	}
}
