import type { FastifyRequest } from 'fastify'
import {
	assertObjectPermission,
	assertPermission,
	type PermissionContext,
	type PermissionPolicy,
} from '../common/permissions.js'
import type { Authored, User } from '../types/models.js'
import { AuthenticationError } from '../types/common.js'

function contextOf(request: FastifyRequest): PermissionContext {
	return { method: request.method, user: request.user }
}

/**
 * Route guard; all policies must allow the request.
 * @example fastify.post('/titles', { preHandler: requirePermission(AdminOrReadOnly) }, TitleController.create)
 */
export function requirePermission(...policies: PermissionPolicy[]) {
	return async (request: FastifyRequest) => {
		assertPermission(policies, contextOf(request))
	}
}

/** Instance-level half of the same policies, run once the handler has loaded the record. */
export function checkObjectPermission(request: FastifyRequest, policies: readonly PermissionPolicy[], resource: Authored) {
	assertObjectPermission(policies, contextOf(request), resource)
}

/** The authenticated requester, for handlers behind a policy that already refused anonymous mutations. */
export function requireUser(request: FastifyRequest): User {
	if (!request.user) throw new AuthenticationError()
	return request.user
}
