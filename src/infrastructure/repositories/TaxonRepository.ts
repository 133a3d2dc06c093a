import { CategoryModel, GenreModel } from '../models/Taxon.js'
import { getNextSequence, type SequenceName } from '../models/Sequence.js'
import type { Taxon, TaxonKind } from '../../types/models.js'
import type { Listing } from '../../common/pagination.js'
import { containsInsensitive } from '../../common/regex.js'
import { isDuplicateKeyError } from './errors.js'
import { DuplicateSlugError, type TaxonRepository } from './types.js'

interface TaxonRow {
	taxonId: number
	name: string
	slug: string
}

interface TaxonConfig {
	model: typeof CategoryModel
	sequence: SequenceName
}

const TAXON_CONFIG: Record<TaxonKind, TaxonConfig> = {
	category: { model: CategoryModel, sequence: 'categoryId' },
	genre: { model: GenreModel, sequence: 'genreId' },
}

export function toTaxon(row: TaxonRow): Taxon {
	return { id: row.taxonId, name: row.name, slug: row.slug }
}

export class MongoTaxonRepository implements TaxonRepository {
	private readonly config: TaxonConfig

	constructor(readonly kind: TaxonKind) {
		this.config = TAXON_CONFIG[kind]
	}

	list(search?: string): Listing<Taxon> {
		const { model } = this.config
		const filter = search ? { name: containsInsensitive(search) } : {}
		return {
			count: () => model.countDocuments(filter),
			slice: async (offset, limit) => {
				const rows = await model.find(filter).sort({ name: 1, taxonId: 1 }).skip(offset).limit(limit).lean<TaxonRow[]>()
				return rows.map(toTaxon)
			},
		}
	}

	async findBySlug(slug: string) {
		const row = await this.config.model.findOne({ slug }).lean<TaxonRow>()
		return row ? toTaxon(row) : null
	}

	async findBySlugs(slugs: readonly string[]) {
		const rows = await this.config.model.find({ slug: { $in: [...slugs] } }).lean<TaxonRow[]>()
		return rows.map(toTaxon)
	}

	async create(data: { name: string; slug: string }) {
		const taxonId = await getNextSequence(this.config.sequence)
		try {
			const doc = await this.config.model.create({ taxonId, name: data.name, slug: data.slug })
			return toTaxon(doc.toObject<TaxonRow>())
		} catch (error) {
			if (isDuplicateKeyError(error)) throw new DuplicateSlugError(this.kind, data.slug)
			throw error
		}
	}

	async delete(id: number) {
		const result = await this.config.model.deleteOne({ taxonId: id })
		return result.deletedCount > 0
	}
}
