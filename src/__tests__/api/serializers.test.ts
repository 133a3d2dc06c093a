import { describe, it, expect } from 'vitest'
import { parse } from '../../api/serializers/fields.js'
import { reviewCreateSchema, reviewPatchSchema } from '../../api/serializers/reviews.js'
import { titleCreateSchema, titleQuerySchema, titleReadRepresentation, titleWriteRepresentation } from '../../api/serializers/titles.js'
import { taxonSchema } from '../../api/serializers/taxonomy.js'
import { profilePatchSchema, signUpSchema, userCreateSchema } from '../../api/serializers/users.js'
import { ValidationError } from '../../types/common.js'
import type { TitleView } from '../../types/models.js'

function fieldErrors(run: () => unknown) {
	try {
		run()
	} catch (error) {
		if (error instanceof ValidationError) return error.fields
		throw error
	}
	throw new Error('expected a validation error')
}

describe('review input', () => {
	it('accepts scores from 0 to 10, including digit strings', () => {
		expect(parse(reviewCreateSchema, { text: 'Fine', score: 0 })).toEqual({ text: 'Fine', score: 0 })
		expect(parse(reviewCreateSchema, { text: 'Fine', score: '10' })).toEqual({ text: 'Fine', score: 10 })
	})

	it('rejects scores outside the range and non-integers', () => {
		expect(fieldErrors(() => parse(reviewCreateSchema, { text: 'x', score: 11 }))).toEqual({
			score: ['Ensure this value is less than or equal to 10.'],
		})
		expect(fieldErrors(() => parse(reviewCreateSchema, { text: 'x', score: -1 }))).toEqual({
			score: ['Ensure this value is greater than or equal to 0.'],
		})
		expect(fieldErrors(() => parse(reviewCreateSchema, { text: 'x', score: 7.5 }))).toEqual({
			score: ['A valid integer is required.'],
		})
	})

	it('reports every missing field', () => {
		expect(fieldErrors(() => parse(reviewCreateSchema, {}))).toEqual({
			text: ['This field is required.'],
			score: ['This field is required.'],
		})
	})

	it('allows partial updates', () => {
		expect(parse(reviewPatchSchema, { score: 4 })).toEqual({ score: 4 })
	})
})

describe('title input', () => {
	it('refuses a year in the future', () => {
		const nextYear = new Date().getFullYear() + 1
		const errors = fieldErrors(() => parse(titleCreateSchema, { name: 'T', year: nextYear, category: 'books', genre: [] }))
		expect(errors).toEqual({ year: ['Year cannot be in the future.'] })
	})

	it('requires category and genre', () => {
		const errors = fieldErrors(() => parse(titleCreateSchema, { name: 'T', year: 2000 }))
		expect(errors).toEqual({ category: ['This field is required.'], genre: ['This field is required.'] })
	})

	it('parses query filters, ignoring unknown keys', () => {
		expect(parse(titleQuerySchema, { year: '1994', name: 'pulp', page: '2' })).toEqual({ year: 1994, name: 'pulp' })
	})

	it('renders read and write shapes', () => {
		const title: TitleView = {
			id: 5,
			name: 'Pulp Fiction',
			year: 1994,
			description: null,
			rating: 7.5,
			category: { id: 1, name: 'Films', slug: 'films' },
			genres: [{ id: 2, name: 'Comedy', slug: 'comedy' }, { id: 3, name: 'Drama', slug: 'drama' }],
		}
		expect(titleReadRepresentation(title)).toEqual({
			id: 5,
			name: 'Pulp Fiction',
			year: 1994,
			rating: 7.5,
			description: null,
			genre: [{ name: 'Comedy', slug: 'comedy' }, { name: 'Drama', slug: 'drama' }],
			category: { name: 'Films', slug: 'films' },
		})
		expect(titleWriteRepresentation(title)).toEqual({
			id: 5,
			name: 'Pulp Fiction',
			year: 1994,
			description: null,
			genre: ['comedy', 'drama'],
			category: 'films',
		})
	})
})

describe('taxonomy input', () => {
	it('validates the slug alphabet', () => {
		expect(fieldErrors(() => parse(taxonSchema, { name: 'Sci-fi', slug: 'sci fi' }))).toEqual({
			slug: ['Enter a valid "slug" consisting of letters, numbers, underscores or hyphens.'],
		})
	})
})

describe('user input', () => {
	it('refuses the reserved username everywhere it is written', () => {
		const expected = { username: ['Username "me" is not allowed.'] }
		expect(fieldErrors(() => parse(signUpSchema, { username: 'me', email: 'me@example.com' }))).toEqual(expected)
		expect(fieldErrors(() => parse(userCreateSchema, { username: 'me', email: 'me@example.com' }))).toEqual(expected)
	})

	it('maps snake_case fields onto the service input', () => {
		expect(parse(userCreateSchema, { username: 'carol', email: 'carol@example.com', first_name: 'Carol', role: 'moderator' }))
			.toEqual({ username: 'carol', email: 'carol@example.com', firstName: 'Carol', role: 'moderator' })
	})

	it('drops role from profile edits', () => {
		expect(parse(profilePatchSchema, { role: 'admin', bio: 'Hi' })).toEqual({ bio: 'Hi' })
	})

	it('rejects malformed emails and unknown roles', () => {
		expect(fieldErrors(() => parse(userCreateSchema, { username: 'dave', email: 'nope', role: 'root' }))).toEqual({
			email: ['Enter a valid email address.'],
			role: ['Must be one of: user, moderator, admin.'],
		})
	})
})
