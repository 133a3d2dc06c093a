import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import type { Comment, Review, Taxon, TitleView, User } from '../../types/models.js'
import { assertCanModify } from '../../common/permissions.js'
import { requireUser } from '../../plugins/permissions.js'
import { idParam, queryValue, stringParam } from '../../api/request.js'
import { parse } from '../../api/serializers/fields.js'
import { titleReadRepresentation } from '../../api/serializers/titles.js'
import { commentRepresentation, reviewRepresentation } from '../../api/serializers/reviews.js'
import { taxonRepresentation } from '../../api/serializers/taxonomy.js'
import { relatedListPage } from '../listing.js'
import { createAction, deleteAction } from '../actions.js'
import { commentForm, reviewForm } from '../forms.js'

export const titleUrl = (titleId: number) => `/titles/${titleId}`
export const reviewUrl = (reviewId: number) => `/reviews/${reviewId}`

function profileRepresentation(user: User) {
	return {
		username: user.username,
		first_name: user.firstName,
		last_name: user.lastName,
		bio: user.bio,
	}
}

function taxonPage(kind: 'categories' | 'genres') {
	return relatedListPage<Taxon, TitleView>({
		resolveParent: request => request.server.services[kind].findBySlug(stringParam(request, 'slug')),
		listRelated: (request, taxon) => kind === 'categories'
			? request.server.services.titles.listForCategory(taxon.id)
			: request.server.services.titles.listForGenre(taxon.id),
		pageSize: 10,
		parentKey: kind === 'categories' ? 'category' : 'genre',
		itemsKey: 'titles',
		representParent: taxonRepresentation,
		representItem: titleReadRepresentation,
	})
}

async function loadEditableReview(request: FastifyRequest) {
	const user = requireUser(request)
	const review = await request.server.services.reviews.get(idParam(request, 'reviewId'), idParam(request, 'titleId'))
	assertCanModify(user, review)
	return review
}

const searchResults = relatedListPage<string, Review>({
	resolveParent: async request => queryValue(request, 'q') || null,
	listRelated: (request, q) => request.server.services.reviews.search(q),
	pageSize: 10,
	parentKey: 'query',
	itemsKey: 'reviews',
	representItem: reviewRepresentation,
})

export default async function catalogueRoutes(fastify: FastifyInstance) {
	fastify.get('/', relatedListPage<Record<string, never>, TitleView>({
		resolveParent: async () => ({}),
		listRelated: request => request.server.services.titles.list(),
		pageSize: 10,
		itemsKey: 'titles',
		representItem: titleReadRepresentation,
	}))

	fastify.get('/titles/:titleId', relatedListPage<TitleView, Review>({
		resolveParent: request => request.server.services.titles.find(idParam(request, 'titleId')),
		listRelated: (request, title) => request.server.services.reviews.listForTitle(title.id),
		pageSize: 5,
		parentKey: 'title',
		itemsKey: 'reviews',
		representParent: titleReadRepresentation,
		representItem: reviewRepresentation,
		extra: title => ({ actionUrl: `${titleUrl(title.id)}/review/create` }),
	}))

	fastify.get('/reviews/:reviewId', relatedListPage<Review, Comment>({
		resolveParent: request => request.server.services.reviews.find(idParam(request, 'reviewId')),
		listRelated: (request, review) => request.server.services.comments.listForReview(review),
		pageSize: 10,
		parentKey: 'review',
		itemsKey: 'comments',
		representParent: reviewRepresentation,
		representItem: commentRepresentation,
		extra: review => ({ actionUrl: `${reviewUrl(review.id)}/comment` }),
	}))

	fastify.get('/category/:slug', taxonPage('categories'))
	fastify.get('/genre/:slug', taxonPage('genres'))

	fastify.get('/profile/:username', relatedListPage<User, Review>({
		resolveParent: request => request.server.services.users.findByUsername(stringParam(request, 'username')),
		listRelated: (request, author) => request.server.services.reviews.listForAuthor(author.id),
		pageSize: 10,
		parentKey: 'author',
		itemsKey: 'reviews',
		representParent: profileRepresentation,
		representItem: reviewRepresentation,
	}))

	fastify.get('/search', async request => {
		if (!queryValue(request, 'q')) return { query: null, reviews: null, page: null }
		return searchResults(request)
	})

	fastify.post('/titles/:titleId/review/create', createAction({
		resolveParent: request => request.server.services.titles.find(idParam(request, 'titleId')),
		formSchema: reviewForm,
		create: (request, title: TitleView, author, data) => request.server.services.reviews.create(title.id, author, data),
		successUrl: title => titleUrl(title.id),
	}))

	fastify.get('/titles/:titleId/review/:reviewId/update', async request => {
		const review = await loadEditableReview(request)
		return {
			review: reviewRepresentation(review),
			form: { text: review.text, score: review.score },
			actionUrl: `${titleUrl(review.titleId)}/review/${review.id}/update`,
		}
	})

	fastify.post('/titles/:titleId/review/:reviewId/update', async (request: FastifyRequest, reply: FastifyReply) => {
		const review = await loadEditableReview(request)
		const data = parse(reviewForm, request.body)
		await request.server.services.reviews.update(review, data)
		return reply.redirect(titleUrl(review.titleId))
	})

	fastify.route({
		method: ['POST', 'DELETE'],
		url: '/titles/:titleId/review/:reviewId/delete',
		handler: deleteAction<Review>({
			resolveTarget: request => request.server.services.reviews.find(idParam(request, 'reviewId'), idParam(request, 'titleId')),
			remove: (request, review) => request.server.services.reviews.destroy(review),
			successUrl: review => titleUrl(review.titleId),
		}),
	})

	fastify.post('/reviews/:reviewId/comment', createAction({
		resolveParent: request => request.server.services.reviews.find(idParam(request, 'reviewId')),
		formSchema: commentForm,
		create: (request, review: Review, author, data) => request.server.services.comments.create(review, author, data.text),
		successUrl: review => reviewUrl(review.id),
	}))

	fastify.route({
		method: ['POST', 'DELETE'],
		url: '/reviews/:reviewId/comment/:commentId/delete',
		handler: deleteAction<Comment>({
			resolveTarget: request => request.server.services.comments.find(idParam(request, 'reviewId'), idParam(request, 'commentId')),
			remove: (request, comment) => request.server.services.comments.destroy(comment),
			successUrl: comment => reviewUrl(comment.reviewId),
		}),
	})
}
