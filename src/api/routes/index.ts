import type { FastifyInstance } from 'fastify'

/** Everything under `/api/v1`; the prefix is applied where this plugin is registered. */
export default async function registerRoutes(fastify: FastifyInstance) {
	const AuthRoutes = (await import('./auth.js')).default
	await fastify.register(AuthRoutes)

	const UserRoutes = (await import('./user.js')).default
	await fastify.register(UserRoutes)

	const TaxonomyRoutes = (await import('./taxonomy.js')).default
	await fastify.register(TaxonomyRoutes)

	const TitleRoutes = (await import('./title.js')).default
	await fastify.register(TitleRoutes)

	const ReviewRoutes = (await import('./review.js')).default
	await fastify.register(ReviewRoutes)

	const CommentRoutes = (await import('./comment.js')).default
	await fastify.register(CommentRoutes)
}
