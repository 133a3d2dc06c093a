import { DuplicateSlugError, type Repositories, type TaxonRepository } from '../infrastructure/repositories/index.js'
import type { Listing } from '../common/pagination.js'
import type { Taxon, TaxonKind } from '../types/models.js'
import { ConflictError, NotFoundError, ValidationError } from '../types/common.js'
import { purgeTitles } from './cascade.js'

export type CategoryDeletePolicy = 'cascade' | 'restrict'

export interface TaxonInput {
	name: string
	slug: string
}

/**
 * Categories and genres. Both are flat name/slug lists addressed by slug;
 * they differ only in what happens to titles on removal.
 */
export class TaxonomyService {
	private readonly store: TaxonRepository

	constructor(
		private readonly repositories: Repositories,
		readonly kind: TaxonKind,
		private readonly deletePolicy: CategoryDeletePolicy = 'cascade',
	) {
		this.store = kind === 'category' ? repositories.categories : repositories.genres
	}

	list(search?: string): Listing<Taxon> {
		return this.store.list(search)
	}

	findBySlug(slug: string): Promise<Taxon | null> {
		return this.store.findBySlug(slug)
	}

	async getBySlug(slug: string): Promise<Taxon> {
		const taxon = await this.findBySlug(slug)
		if (!taxon) throw new NotFoundError()
		return taxon
	}

	/** The lookup catches the common case; the unique slug index settles concurrent creates. */
	async create(input: TaxonInput): Promise<Taxon> {
		if (await this.store.findBySlug(input.slug)) throw this.duplicateSlug()
		let created: Taxon
		try {
			created = await this.store.create(input)
		} catch (error) {
			if (error instanceof DuplicateSlugError) throw this.duplicateSlug()
			throw error
		}
		console.log(`✅ Created ${this.kind} "${created.slug}"`)
		return created
	}

	async destroy(slug: string): Promise<void> {
		const taxon = await this.getBySlug(slug)
		if (this.kind === 'genre') {
			await this.repositories.titles.unbindGenre(taxon.id)
		} else if (this.deletePolicy === 'restrict') {
			const inUse = await this.repositories.titles.countForCategory(taxon.id)
			if (inUse > 0) {
				throw new ConflictError(`Cannot delete category "${slug}": ${inUse} title(s) still reference it.`)
			}
		} else {
			await purgeTitles(this.repositories, await this.repositories.titles.idsForCategory(taxon.id))
		}
		await this.store.delete(taxon.id)
		console.log(`🗑️ Deleted ${this.kind} "${slug}"`)
	}

	private duplicateSlug() {
		return ValidationError.forField('slug', `${this.kind} with this slug already exists.`)
	}
}
