import type { FastifyInstance } from 'fastify'
import { REVIEW_POLICIES, ReviewController } from '../controllers/ReviewController.js'
import { requirePermission } from '../../plugins/permissions.js'

export default async function reviewRoutes(fastify: FastifyInstance) {
	const guard = { preHandler: requirePermission(...REVIEW_POLICIES) }
	fastify.get('/titles/:titleId/reviews', guard, ReviewController.list)
	fastify.post('/titles/:titleId/reviews', guard, ReviewController.create)
	fastify.get('/titles/:titleId/reviews/:reviewId', guard, ReviewController.retrieve)
	fastify.patch('/titles/:titleId/reviews/:reviewId', guard, ReviewController.partialUpdate)
	fastify.delete('/titles/:titleId/reviews/:reviewId', guard, ReviewController.destroy)
}
