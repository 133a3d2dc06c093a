import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { FastifyInstance } from 'fastify'
import { bearer, buildTestApp, createWorld, seedCatalogue, type Catalogue, type World } from '../helpers/fixtures.js'

describe('reviews and comments API', () => {
	let world: World
	let c: Catalogue
	let app: FastifyInstance

	beforeEach(async () => {
		world = createWorld()
		c = await seedCatalogue(world)
		app = await buildTestApp(world)
	})

	afterEach(async () => {
		await app.close()
	})

	const reviewsUrl = () => `/api/v1/titles/${c.novel.id}/reviews`

	it('requires authentication to post a review', async () => {
		const res = await app.inject({ method: 'POST', url: reviewsUrl(), payload: { text: 'Hi', score: 5 } })
		expect(res.statusCode).toBe(401)
	})

	it('creates a review authored by the requester', async () => {
		const res = await app.inject({ method: 'POST', url: reviewsUrl(), payload: { text: 'Epic', score: 9 }, headers: bearer(c.alice) })

		expect(res.statusCode).toBe(201)
		const body = res.json()
		expect(body).toMatchObject({ author: 'alice', text: 'Epic', score: 9 })
		expect(typeof body.id).toBe('number')
		expect(new Date(body.pub_date).toISOString()).toBe(body.pub_date)
	})

	it('refuses a second review of the same title by the same author', async () => {
		await app.inject({ method: 'POST', url: reviewsUrl(), payload: { text: 'Epic', score: 9 }, headers: bearer(c.alice) })
		const res = await app.inject({ method: 'POST', url: reviewsUrl(), payload: { text: 'Again', score: 1 }, headers: bearer(c.alice) })

		expect(res.statusCode).toBe(400)
		expect(res.json().errors).toEqual({ non_field_errors: ['You have already reviewed this title.'] })
	})

	it('validates the score range', async () => {
		const res = await app.inject({ method: 'POST', url: reviewsUrl(), payload: { text: 'Epic', score: 11 }, headers: bearer(c.alice) })
		expect(res.statusCode).toBe(400)
		expect(res.json().errors).toEqual({ score: ['Ensure this value is less than or equal to 10.'] })
	})

	it('returns 404 for reviews of an unknown title', async () => {
		const res = await app.inject({ method: 'GET', url: '/api/v1/titles/9999/reviews' })
		expect(res.statusCode).toBe(404)
	})

	it('lets authors and moderators edit, but not other users', async () => {
		const review = await world.services.reviews.create(c.novel.id, c.alice, { text: 'Epic', score: 9 })
		const url = `${reviewsUrl()}/${review.id}`

		const other = await app.inject({ method: 'PATCH', url, payload: { score: 1 }, headers: bearer(c.bob) })
		expect(other.statusCode).toBe(403)

		const author = await app.inject({ method: 'PATCH', url, payload: { score: 8 }, headers: bearer(c.alice) })
		expect(author.statusCode).toBe(200)
		expect(author.json()).toMatchObject({ text: 'Epic', score: 8 })

		const moderator = await app.inject({ method: 'DELETE', url, headers: bearer(c.moderator) })
		expect(moderator.statusCode).toBe(204)
		expect(world.store.reviews).toHaveLength(0)
	})

	it('hides a review behind the wrong title', async () => {
		const review = await world.services.reviews.create(c.novel.id, c.alice, { text: 'Epic', score: 9 })
		const res = await app.inject({ method: 'GET', url: `/api/v1/titles/${c.film.id}/reviews/${review.id}` })
		expect(res.statusCode).toBe(404)
	})

	it('manages comments under a review', async () => {
		const review = await world.services.reviews.create(c.novel.id, c.alice, { text: 'Epic', score: 9 })
		const commentsUrl = `${reviewsUrl()}/${review.id}/comments`

		const created = await app.inject({ method: 'POST', url: commentsUrl, payload: { text: 'Agreed' }, headers: bearer(c.bob) })
		expect(created.statusCode).toBe(201)
		const comment = created.json()
		expect(comment).toMatchObject({ review: review.id, author: 'bob', text: 'Agreed' })

		const listed = (await app.inject({ method: 'GET', url: commentsUrl })).json()
		expect(listed.count).toBe(1)
		expect(listed.results[0].id).toBe(comment.id)

		const forbidden = await app.inject({ method: 'DELETE', url: `${commentsUrl}/${comment.id}`, headers: bearer(c.alice) })
		expect(forbidden.statusCode).toBe(403)

		const edited = await app.inject({ method: 'PATCH', url: `${commentsUrl}/${comment.id}`, payload: { text: 'Fully agreed' }, headers: bearer(c.bob) })
		expect(edited.json().text).toBe('Fully agreed')

		const removed = await app.inject({ method: 'DELETE', url: `${commentsUrl}/${comment.id}`, headers: bearer(c.bob) })
		expect(removed.statusCode).toBe(204)
	})

	it('returns 404 for comments when the review belongs to another title', async () => {
		const review = await world.services.reviews.create(c.novel.id, c.alice, { text: 'Epic', score: 9 })
		const res = await app.inject({
			method: 'POST',
			url: `/api/v1/titles/${c.film.id}/reviews/${review.id}/comments`,
			payload: { text: 'Lost' },
			headers: bearer(c.bob),
		})
		expect(res.statusCode).toBe(404)
		expect(world.store.comments).toHaveLength(0)
	})

	it('returns 404 for a comment of another review', async () => {
		const first = await world.services.reviews.create(c.novel.id, c.alice, { text: 'Epic', score: 9 })
		const second = await world.services.reviews.create(c.novel.id, c.bob, { text: 'Meh', score: 4 })
		const comment = await world.services.comments.create(first, c.bob, 'Agreed')

		const res = await app.inject({ method: 'GET', url: `${reviewsUrl()}/${second.id}/comments/${comment.id}` })
		expect(res.statusCode).toBe(404)
	})
})
