import type { FastifyInstance } from 'fastify'

/** Browsing pages; each handler returns its page context as JSON. */
export default async function registerWebRoutes(fastify: FastifyInstance) {
	const CatalogueRoutes = (await import('./catalogue.js')).default
	await fastify.register(CatalogueRoutes)

	const AccountRoutes = (await import('./account.js')).default
	await fastify.register(AccountRoutes)
}
