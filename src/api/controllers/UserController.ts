import type { FastifyReply, FastifyRequest } from 'fastify'
import { HttpStatus } from '../../types/common.js'
import { requireUser } from '../../plugins/permissions.js'
import { parse } from '../serializers/fields.js'
import {
	profilePatchSchema,
	userCreateSchema,
	userPatchSchema,
	userQuerySchema,
	userRepresentation,
} from '../serializers/users.js'
import { paginatedResponse } from '../pagination.js'
import { stringParam } from '../request.js'

export const UserController = {
	list: async (request: FastifyRequest) => {
		const { search } = parse(userQuerySchema, request.query)
		return paginatedResponse(request, request.server.services.users.list(search), userRepresentation)
	},

	create: async (request: FastifyRequest, reply: FastifyReply) => {
		const input = parse(userCreateSchema, request.body)
		const user = await request.server.services.users.create(input)
		reply.code(HttpStatus.CREATED)
		return userRepresentation(user)
	},

	retrieve: async (request: FastifyRequest) => {
		const user = await request.server.services.users.getByUsername(stringParam(request, 'username'))
		return userRepresentation(user)
	},

	partialUpdate: async (request: FastifyRequest) => {
		const patch = parse(userPatchSchema, request.body)
		const user = await request.server.services.users.update(stringParam(request, 'username'), patch)
		return userRepresentation(user)
	},

	destroy: async (request: FastifyRequest, reply: FastifyReply) => {
		await request.server.services.users.destroy(stringParam(request, 'username'))
		return reply.code(HttpStatus.NO_CONTENT).send()
	},

	me: async (request: FastifyRequest) => {
		return userRepresentation(requireUser(request))
	},

	updateMe: async (request: FastifyRequest) => {
		const patch = parse(profilePatchSchema, request.body)
		const user = await request.server.services.users.updateProfile(requireUser(request), patch)
		return userRepresentation(user)
	},
}
