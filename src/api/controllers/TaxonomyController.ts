import type { FastifyReply, FastifyRequest } from 'fastify'
import { HttpStatus } from '../../types/common.js'
import type { TaxonomyService } from '../../services/TaxonomyService.js'
import type { Services } from '../../services/index.js'
import { parse } from '../serializers/fields.js'
import { searchQuery, taxonRepresentation, taxonSchema } from '../serializers/taxonomy.js'
import { paginatedResponse } from '../pagination.js'
import { stringParam } from '../request.js'

type TaxonomyKey = keyof Pick<Services, 'categories' | 'genres'>

/** Categories and genres expose the same list/create/destroy trio. */
export function createTaxonomyController(key: TaxonomyKey) {
	const service = (request: FastifyRequest): TaxonomyService => request.server.services[key]

	return {
		list: async (request: FastifyRequest) => {
			const { search } = parse(searchQuery, request.query)
			return paginatedResponse(request, service(request).list(search), taxonRepresentation)
		},

		create: async (request: FastifyRequest, reply: FastifyReply) => {
			const input = parse(taxonSchema, request.body)
			const taxon = await service(request).create(input)
			reply.code(HttpStatus.CREATED)
			return taxonRepresentation(taxon)
		},

		destroy: async (request: FastifyRequest, reply: FastifyReply) => {
			await service(request).destroy(stringParam(request, 'slug'))
			return reply.code(HttpStatus.NO_CONTENT).send()
		},
	}
}
