import type { FastifyReply, FastifyRequest } from 'fastify'
import { AuthorOrPrivilegedOrReadOnly } from '../../common/permissions.js'
import { HttpStatus } from '../../types/common.js'
import { checkObjectPermission, requireUser } from '../../plugins/permissions.js'
import { parse } from '../serializers/fields.js'
import { commentCreateSchema, commentPatchSchema, commentRepresentation } from '../serializers/reviews.js'
import { paginatedResponse } from '../pagination.js'
import { idParam } from '../request.js'

export const COMMENT_POLICIES = [AuthorOrPrivilegedOrReadOnly]

// The review must exist and belong to the title in the path
function loadReview(request: FastifyRequest) {
	return request.server.services.reviews.get(idParam(request, 'reviewId'), idParam(request, 'titleId'))
}

async function loadComment(request: FastifyRequest) {
	const review = await loadReview(request)
	return request.server.services.comments.get(review, idParam(request, 'commentId'))
}

export const CommentController = {
	list: async (request: FastifyRequest) => {
		const review = await loadReview(request)
		return paginatedResponse(request, request.server.services.comments.listForReview(review), commentRepresentation)
	},

	retrieve: async (request: FastifyRequest) => {
		return commentRepresentation(await loadComment(request))
	},

	create: async (request: FastifyRequest, reply: FastifyReply) => {
		const review = await loadReview(request)
		const { text } = parse(commentCreateSchema, request.body)
		const comment = await request.server.services.comments.create(review, requireUser(request), text)
		reply.code(HttpStatus.CREATED)
		return commentRepresentation(comment)
	},

	partialUpdate: async (request: FastifyRequest) => {
		const comment = await loadComment(request)
		checkObjectPermission(request, COMMENT_POLICIES, comment)
		const patch = parse(commentPatchSchema, request.body)
		return commentRepresentation(await request.server.services.comments.update(comment, patch))
	},

	destroy: async (request: FastifyRequest, reply: FastifyReply) => {
		const comment = await loadComment(request)
		checkObjectPermission(request, COMMENT_POLICIES, comment)
		await request.server.services.comments.destroy(comment)
		return reply.code(HttpStatus.NO_CONTENT).send()
	},
}
