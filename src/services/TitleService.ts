import type { Repositories } from '../infrastructure/repositories/index.js'
import { emptyListing, type Listing } from '../common/pagination.js'
import type { TitleData, TitleFilter, TitleView } from '../types/models.js'
import { NotFoundError, ValidationError, type FieldErrors } from '../types/common.js'
import { purgeTitles } from './cascade.js'

export interface TitleQuery {
	category?: string
	genre?: string
	name?: string
	year?: number
}

/** Titles as clients write them: taxonomy by slug. */
export interface TitleInput {
	name: string
	year: number
	description?: string | null
	category: string
	genre: string[]
}

export type TitlePatch = Partial<TitleInput>

function missingSlug(slug: string) {
	return `Object with slug=${slug} does not exist.`
}

export class TitleService {
	constructor(private readonly repositories: Repositories) {}

	/** Filters combine with AND; a slug that names nothing yields no titles. */
	async list(query: TitleQuery = {}): Promise<Listing<TitleView>> {
		const filter: TitleFilter = {}
		if (query.category) {
			const category = await this.repositories.categories.findBySlug(query.category)
			if (!category) return emptyListing()
			filter.categoryId = category.id
		}
		if (query.genre) {
			const genre = await this.repositories.genres.findBySlug(query.genre)
			if (!genre) return emptyListing()
			filter.genreId = genre.id
		}
		if (query.name) filter.name = query.name
		if (query.year !== undefined) filter.year = query.year
		return this.repositories.titles.list(filter)
	}

	listForCategory(categoryId: number): Listing<TitleView> {
		return this.repositories.titles.list({ categoryId })
	}

	listForGenre(genreId: number): Listing<TitleView> {
		return this.repositories.titles.list({ genreId })
	}

	find(id: number): Promise<TitleView | null> {
		return this.repositories.titles.findById(id)
	}

	async get(id: number): Promise<TitleView> {
		const title = await this.find(id)
		if (!title) throw new NotFoundError()
		return title
	}

	async create(input: TitleInput): Promise<TitleView> {
		const errors: FieldErrors = {}
		const categoryId = await this.resolveCategory(input.category, errors)
		const genreIds = await this.resolveGenres(input.genre, errors)
		if (categoryId === undefined || genreIds === undefined) throw new ValidationError(errors)

		const data: TitleData = {
			name: input.name,
			year: input.year,
			description: input.description ?? null,
			categoryId,
			genreIds,
		}
		const created = await this.repositories.titles.create(data)
		console.log(`✅ Created title ${created.id} "${created.name}"`)
		return created
	}

	async update(id: number, patch: TitlePatch): Promise<TitleView> {
		await this.get(id)
		const errors: FieldErrors = {}
		const data: Partial<TitleData> = {}
		if (patch.name !== undefined) data.name = patch.name
		if (patch.year !== undefined) data.year = patch.year
		if (patch.description !== undefined) data.description = patch.description
		if (patch.category !== undefined) data.categoryId = await this.resolveCategory(patch.category, errors)
		if (patch.genre !== undefined) data.genreIds = await this.resolveGenres(patch.genre, errors)
		if (Object.keys(errors).length > 0) throw new ValidationError(errors)

		const updated = await this.repositories.titles.update(id, data)
		if (!updated) throw new NotFoundError()
		return updated
	}

	async destroy(id: number): Promise<void> {
		await this.get(id)
		await purgeTitles(this.repositories, [id])
		console.log(`🗑️ Deleted title ${id}`)
	}

	private async resolveCategory(slug: string, errors: FieldErrors): Promise<number | undefined> {
		const category = await this.repositories.categories.findBySlug(slug)
		if (category) return category.id
		errors.category = [missingSlug(slug)]
		return undefined
	}

	private async resolveGenres(slugs: readonly string[], errors: FieldErrors): Promise<number[] | undefined> {
		const genres = await this.repositories.genres.findBySlugs(slugs)
		const known = new Set(genres.map(genre => genre.slug))
		const unknown = slugs.filter(slug => !known.has(slug))
		if (unknown.length === 0) return genres.map(genre => genre.id)
		errors.genre = unknown.map(missingSlug)
		return undefined
	}
}
