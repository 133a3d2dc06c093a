import type { FastifyInstance } from 'fastify'
import { createTaxonomyController } from '../controllers/TaxonomyController.js'
import { requirePermission } from '../../plugins/permissions.js'
import { AdminOrReadOnly } from '../../common/permissions.js'

export default async function taxonomyRoutes(fastify: FastifyInstance) {
	const guard = { preHandler: requirePermission(AdminOrReadOnly) }

	for (const key of ['categories', 'genres'] as const) {
		const controller = createTaxonomyController(key)
		fastify.get(`/${key}`, guard, controller.list)
		fastify.post(`/${key}`, guard, controller.create)
		fastify.delete(`/${key}/:slug`, guard, controller.destroy)
	}
}
