import type { FastifyInstance } from 'fastify'
import { UserController } from '../controllers/UserController.js'
import { requirePermission } from '../../plugins/permissions.js'
import { AdminOnly, Authenticated } from '../../common/permissions.js'

export default async function userRoutes(fastify: FastifyInstance) {
	// Own profile, any authenticated user
	fastify.get('/users/me', { preHandler: requirePermission(Authenticated) }, UserController.me)
	fastify.patch('/users/me', { preHandler: requirePermission(Authenticated) }, UserController.updateMe)

	const adminOnly = { preHandler: requirePermission(AdminOnly) }
	fastify.get('/users', adminOnly, UserController.list)
	fastify.post('/users', adminOnly, UserController.create)
	fastify.get('/users/:username', adminOnly, UserController.retrieve)
	fastify.patch('/users/:username', adminOnly, UserController.partialUpdate)
	fastify.delete('/users/:username', adminOnly, UserController.destroy)
}
