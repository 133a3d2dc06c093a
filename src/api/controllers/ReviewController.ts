import type { FastifyReply, FastifyRequest } from 'fastify'
import { AuthorOrPrivilegedOrReadOnly } from '../../common/permissions.js'
import { HttpStatus } from '../../types/common.js'
import { checkObjectPermission, requireUser } from '../../plugins/permissions.js'
import { parse } from '../serializers/fields.js'
import { reviewCreateSchema, reviewPatchSchema, reviewRepresentation } from '../serializers/reviews.js'
import { paginatedResponse } from '../pagination.js'
import { idParam } from '../request.js'

export const REVIEW_POLICIES = [AuthorOrPrivilegedOrReadOnly]

function loadReview(request: FastifyRequest) {
	return request.server.services.reviews.get(idParam(request, 'reviewId'), idParam(request, 'titleId'))
}

export const ReviewController = {
	list: async (request: FastifyRequest) => {
		const listing = await request.server.services.reviews.listForTitle(idParam(request, 'titleId'))
		return paginatedResponse(request, listing, reviewRepresentation)
	},

	retrieve: async (request: FastifyRequest) => {
		return reviewRepresentation(await loadReview(request))
	},

	create: async (request: FastifyRequest, reply: FastifyReply) => {
		const titleId = idParam(request, 'titleId')
		const input = parse(reviewCreateSchema, request.body)
		const review = await request.server.services.reviews.create(titleId, requireUser(request), input)
		reply.code(HttpStatus.CREATED)
		return reviewRepresentation(review)
	},

	partialUpdate: async (request: FastifyRequest) => {
		const review = await loadReview(request)
		checkObjectPermission(request, REVIEW_POLICIES, review)
		const patch = parse(reviewPatchSchema, request.body)
		return reviewRepresentation(await request.server.services.reviews.update(review, patch))
	},

	destroy: async (request: FastifyRequest, reply: FastifyReply) => {
		const review = await loadReview(request)
		checkObjectPermission(request, REVIEW_POLICIES, review)
		await request.server.services.reviews.destroy(review)
		return reply.code(HttpStatus.NO_CONTENT).send()
	},
}
