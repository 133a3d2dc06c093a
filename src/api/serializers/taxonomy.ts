import { z } from 'zod'
import type { Taxon } from '../../types/models.js'
import { slug, text } from './fields.js'

export const taxonSchema = z.object({
	name: text(256),
	slug: slug(),
})

export const searchQuery = z.object({
	search: z.string().optional(),
	page: z.string().optional(),
})

export function taxonRepresentation(taxon: Taxon) {
	return { name: taxon.name, slug: taxon.slug }
}
