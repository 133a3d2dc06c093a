import type { FastifyReply, FastifyRequest } from 'fastify'
import { HttpStatus } from '../../types/common.js'
import { parse } from '../serializers/fields.js'
import {
	titleCreateSchema,
	titlePatchSchema,
	titleQuerySchema,
	titleReadRepresentation,
	titleWriteRepresentation,
} from '../serializers/titles.js'
import { paginatedResponse } from '../pagination.js'
import { idParam } from '../request.js'

export const TitleController = {
	list: async (request: FastifyRequest) => {
		const query = parse(titleQuerySchema, request.query)
		const listing = await request.server.services.titles.list(query)
		return paginatedResponse(request, listing, titleReadRepresentation)
	},

	retrieve: async (request: FastifyRequest) => {
		const title = await request.server.services.titles.get(idParam(request, 'titleId'))
		return titleReadRepresentation(title)
	},

	create: async (request: FastifyRequest, reply: FastifyReply) => {
		const input = parse(titleCreateSchema, request.body)
		const title = await request.server.services.titles.create(input)
		reply.code(HttpStatus.CREATED)
		return titleWriteRepresentation(title)
	},

	partialUpdate: async (request: FastifyRequest) => {
		const patch = parse(titlePatchSchema, request.body)
		const title = await request.server.services.titles.update(idParam(request, 'titleId'), patch)
		return titleWriteRepresentation(title)
	},

	destroy: async (request: FastifyRequest, reply: FastifyReply) => {
		await request.server.services.titles.destroy(idParam(request, 'titleId'))
		return reply.code(HttpStatus.NO_CONTENT).send()
	},
}
