import type { FastifyInstance } from 'fastify'
import { TitleController } from '../controllers/TitleController.js'
import { requirePermission } from '../../plugins/permissions.js'
import { AdminOrReadOnly } from '../../common/permissions.js'

export default async function titleRoutes(fastify: FastifyInstance) {
	const guard = { preHandler: requirePermission(AdminOrReadOnly) }
	fastify.get('/titles', guard, TitleController.list)
	fastify.post('/titles', guard, TitleController.create)
	fastify.get('/titles/:titleId', guard, TitleController.retrieve)
	fastify.patch('/titles/:titleId', guard, TitleController.partialUpdate)
	fastify.delete('/titles/:titleId', guard, TitleController.destroy)
}
