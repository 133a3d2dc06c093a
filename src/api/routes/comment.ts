import type { FastifyInstance } from 'fastify'
import { COMMENT_POLICIES, CommentController } from '../controllers/CommentController.js'
import { requirePermission } from '../../plugins/permissions.js'

export default async function commentRoutes(fastify: FastifyInstance) {
	const guard = { preHandler: requirePermission(...COMMENT_POLICIES) }
	const base = '/titles/:titleId/reviews/:reviewId/comments'
	fastify.get(base, guard, CommentController.list)
	fastify.post(base, guard, CommentController.create)
	fastify.get(`${base}/:commentId`, guard, CommentController.retrieve)
	fastify.patch(`${base}/:commentId`, guard, CommentController.partialUpdate)
	fastify.delete(`${base}/:commentId`, guard, CommentController.destroy)
}
