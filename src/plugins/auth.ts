import fp from 'fastify-plugin'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import type { User } from '../types/models.js'
import type { Services } from '../services/index.js'
import { extractToken, verifyAccessToken } from '../common/jwtAuth.js'

declare module 'fastify' {
	interface FastifyInstance {
		services: Services
	}
	interface FastifyRequest {
		user: User | null
	}
}

/**
 * Resolves the requester once per request. A missing, expired or stale
 * token leaves the request anonymous; permission checks decide what an
 * anonymous requester may do.
 */
async function resolveUser(request: FastifyRequest): Promise<User | null> {
	const token = extractToken(request)
	if (!token) return null
	const payload = verifyAccessToken(token)
	if (!payload) return null
	return request.server.services.users.findById(payload.uid)
}

async function authPlugin(fastify: FastifyInstance) {
	fastify.decorateRequest('user', null)

	fastify.addHook('onRequest', async request => {
		request.user = await resolveUser(request)
	})
}

export default fp(authPlugin, { name: 'auth' })
