import { z } from 'zod'
import type { TitleView } from '../../types/models.js'
import { integer, messages, text, year } from './fields.js'
import { taxonRepresentation } from './taxonomy.js'

const slugList = z.array(z.string({ invalid_type_error: messages.string }), {
	required_error: messages.required,
	invalid_type_error: 'Expected a list of items.',
})

const titleFields = z.object({
	name: text(256),
	year: year(),
	description: z.string({ invalid_type_error: messages.string }).nullable().optional(),
	category: z.string({ required_error: messages.required, invalid_type_error: messages.string }),
	genre: slugList,
})

export const titleCreateSchema = titleFields
export const titlePatchSchema = titleFields.partial()

// A filter sent with no value does not filter
function unlessBlank<S extends z.ZodTypeAny>(schema: S) {
	return z.preprocess(value => (value === '' ? undefined : value), schema.optional())
}

export const titleQuerySchema = z.object({
	category: unlessBlank(z.string()),
	genre: unlessBlank(z.string()),
	name: unlessBlank(z.string()),
	year: unlessBlank(integer()),
})

/** Listing and detail shape: taxonomy expanded, rating included. */
export function titleReadRepresentation(title: TitleView) {
	return {
		id: title.id,
		name: title.name,
		year: title.year,
		rating: title.rating,
		description: title.description,
		genre: title.genres.map(taxonRepresentation),
		category: taxonRepresentation(title.category),
	}
}

/** Create/update echo the request shape: taxonomy by slug. */
export function titleWriteRepresentation(title: TitleView) {
	return {
		id: title.id,
		name: title.name,
		year: title.year,
		description: title.description,
		genre: title.genres.map(genre => genre.slug),
		category: title.category.slug,
	}
}
